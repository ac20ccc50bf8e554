/**
 * Layered breadth-first reachability from a single origin
 */

import type { ReadonlyGraph } from '../graph/graph-store.js';
import { InvalidDepthError, InvalidOriginError } from './errors.js';

export type ReachabilityStatus = 'ok' | 'empty-graph';

export interface ReachabilityResult {
  status: ReachabilityStatus;
  origin: number | undefined;
  /** Hop count for every reached node; origin maps to 0 */
  distances: ReadonlyMap<number, number>;
  /** layers[d] holds the nodes at distance d, ascending by id */
  layers: ReadonlyArray<readonly number[]>;
  reachedCount: number;
  /** True when expansion stopped because a frontier came up empty */
  exhausted: boolean;
  /** Depth at which expansion ended */
  stopDepth: number;
}

const UNDISCOVERED = -1;

export function assertDepth(depth: number): void {
  if (!Number.isSafeInteger(depth) || depth < 0) {
    throw new InvalidDepthError(depth);
  }
}

/**
 * Compute shortest-path layers from `origin` out to `maxDepth` hops.
 * Stops early, without emitting an empty layer, once no new node is found.
 */
export function computeLayers(
  graph: ReadonlyGraph,
  origin: number,
  maxDepth: number
): ReachabilityResult {
  assertDepth(maxDepth);

  if (graph.isEmpty) {
    return {
      status: 'empty-graph',
      origin: undefined,
      distances: new Map(),
      layers: [],
      reachedCount: 0,
      exhausted: true,
      stopDepth: 0,
    };
  }

  if (!graph.contains(origin)) {
    throw new InvalidOriginError(origin);
  }

  // Indexed by node rank, not id
  const depthOf = new Int32Array(graph.nodeCount).fill(UNDISCOVERED);
  depthOf[graph.indexOf(origin)] = 0;

  const layers: number[][] = [[origin]];
  let frontier: readonly number[] = [origin];
  let exhausted = false;
  let stopDepth = 0;

  for (let depth = 1; depth <= maxDepth; depth++) {
    const next: number[] = [];
    for (const node of frontier) {
      for (const neighbor of graph.neighbors(node)) {
        const slot = graph.indexOf(neighbor);
        if (depthOf[slot] === UNDISCOVERED) {
          depthOf[slot] = depth;
          next.push(neighbor);
        }
      }
    }

    stopDepth = depth;
    if (next.length === 0) {
      exhausted = true;
      break;
    }

    next.sort((a, b) => a - b);
    layers.push(next);
    frontier = next;
  }

  const distances = new Map<number, number>();
  layers.forEach((layer, depth) => {
    for (const node of layer) {
      distances.set(node, depth);
    }
  });

  return {
    status: 'ok',
    origin,
    distances,
    layers,
    reachedCount: distances.size,
    exhausted,
    stopDepth,
  };
}
