/**
 * Size-bounded node selection and induced subgraph for rendering
 */

import type { Edge, ReadonlyGraph } from '../graph/graph-store.js';
import { InvalidCapError } from './errors.js';
import type { ReachabilityResult } from './reachability.js';

export interface Subgraph {
  /** Selected nodes in priority order */
  nodes: readonly number[];
  /** Distances restricted to the selected nodes */
  distances: ReadonlyMap<number, number>;
  /** Graph edges with both endpoints selected, sorted */
  edges: readonly Edge[];
}

export function assertCap(cap: number): void {
  if (!Number.isSafeInteger(cap) || cap < 1) {
    throw new InvalidCapError(cap);
  }
}

/**
 * Pick at most `cap` reached nodes.
 *
 * Priority: nearer first, then higher degree, then lower id.
 * When everything fits, every reached node is kept.
 */
export function sampleNodes(
  distances: ReadonlyMap<number, number>,
  degreeOf: (node: number) => number,
  cap: number
): number[] {
  assertCap(cap);

  const ranked = Array.from(distances, ([node, distance]) => ({
    node,
    distance,
    degree: degreeOf(node),
  }));

  ranked.sort(
    (a, b) =>
      a.distance - b.distance ||
      b.degree - a.degree ||
      a.node - b.node
  );

  const selected = ranked.length > cap ? ranked.slice(0, cap) : ranked;
  return selected.map(entry => entry.node);
}

/**
 * Build the subgraph induced by `selected`
 */
export function induceSubgraph(
  graph: ReadonlyGraph,
  selected: readonly number[],
  distances: ReadonlyMap<number, number>
): Subgraph {
  const members = new Set(selected);

  const restricted = new Map<number, number>();
  for (const node of selected) {
    const distance = distances.get(node);
    if (distance !== undefined) {
      restricted.set(node, distance);
    }
  }

  const edges: Edge[] = [];
  for (const from of [...members].sort((a, b) => a - b)) {
    for (const to of graph.neighbors(from)) {
      if (to > from && members.has(to)) {
        edges.push([from, to]);
      }
    }
  }

  return { nodes: Object.freeze([...selected]), distances: restricted, edges };
}

/**
 * Sample the reached nodes of a run by (distance, degree) and induce their subgraph
 */
export function sampleSubgraph(
  graph: ReadonlyGraph,
  reachability: ReachabilityResult,
  cap: number
): Subgraph {
  const selected = sampleNodes(reachability.distances, node => graph.degree(node), cap);
  return induceSubgraph(graph, selected, reachability.distances);
}
