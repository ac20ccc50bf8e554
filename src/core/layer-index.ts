/**
 * Per-depth frame projections over a run's layers
 *
 * Discovered sets and visible edges are accumulated once in depth order,
 * so any frame can be queried in any order as a lookup.
 */

import type { Edge } from '../graph/graph-store.js';
import { assertDepth } from './reachability.js';
import type { Subgraph } from './sampler.js';

export interface FrameState {
  depth: number;
  /** Every node at distance <= depth */
  discovered: ReadonlySet<number>;
  /** Nodes at exactly this distance */
  frontier: ReadonlySet<number>;
  /** Discovered nodes that belong to the rendered subgraph */
  visibleNodes: ReadonlySet<number>;
  /** Subgraph edges with both endpoints discovered */
  visibleEdges: readonly Edge[];
  /** Whether this is the last depth with a non-empty frontier */
  isLast: boolean;
}

const EMPTY_SET: ReadonlySet<number> = new Set<number>();

export class LayerIndex {
  readonly lastDepth: number;
  readonly subgraph: Subgraph;

  private readonly layerSets: ReadonlySet<number>[] = [];
  private readonly discoveredByDepth: ReadonlySet<number>[] = [];
  private readonly visibleNodesByDepth: ReadonlySet<number>[] = [];
  private readonly visibleEdgesByDepth: (readonly Edge[])[] = [];

  constructor(layers: ReadonlyArray<readonly number[]>, subgraph: Subgraph) {
    this.subgraph = subgraph;

    let lastDepth = -1;
    layers.forEach((layer, depth) => {
      if (layer.length > 0) lastDepth = depth;
    });
    this.lastDepth = lastDepth;

    const inView = new Set(subgraph.nodes);
    const depthOf = new Map<number, number>();
    let discovered = new Set<number>();
    let visible = new Set<number>();

    for (let depth = 0; depth <= lastDepth; depth++) {
      const layer = layers[depth] ?? [];
      discovered = new Set(discovered);
      visible = new Set(visible);

      for (const node of layer) {
        discovered.add(node);
        depthOf.set(node, depth);
        if (inView.has(node)) visible.add(node);
      }

      this.layerSets.push(new Set(layer));
      this.discoveredByDepth.push(discovered);
      this.visibleNodesByDepth.push(visible);
    }

    this.bucketEdges(subgraph.edges, depthOf);
  }

  /**
   * Order edges by the depth at which their second endpoint is discovered,
   * so the visible edges at depth t form a prefix.
   */
  private bucketEdges(edges: readonly Edge[], depthOf: ReadonlyMap<number, number>): void {
    const buckets: Edge[][] = Array.from({ length: this.lastDepth + 1 }, () => []);

    for (const edge of edges) {
      const fromDepth = depthOf.get(edge[0]);
      const toDepth = depthOf.get(edge[1]);
      if (fromDepth === undefined || toDepth === undefined) continue;
      buckets[Math.max(fromDepth, toDepth)]?.push(edge);
    }

    let visible: readonly Edge[] = [];
    for (const bucket of buckets) {
      visible = [...visible, ...bucket];
      this.visibleEdgesByDepth.push(visible);
    }
  }

  /**
   * Number of non-empty layers
   */
  get depthCount(): number {
    return this.lastDepth + 1;
  }

  discovered(t: number): ReadonlySet<number> {
    return this.lookup(this.discoveredByDepth, t, EMPTY_SET);
  }

  frontier(t: number): ReadonlySet<number> {
    assertDepth(t);
    return this.layerSets[t] ?? EMPTY_SET;
  }

  visibleNodes(t: number): ReadonlySet<number> {
    return this.lookup(this.visibleNodesByDepth, t, EMPTY_SET);
  }

  visibleEdges(t: number): readonly Edge[] {
    return this.lookup(this.visibleEdgesByDepth, t, []);
  }

  isLastDepth(t: number): boolean {
    assertDepth(t);
    return t === this.lastDepth;
  }

  frame(t: number): FrameState {
    return {
      depth: t,
      discovered: this.discovered(t),
      frontier: this.frontier(t),
      visibleNodes: this.visibleNodes(t),
      visibleEdges: this.visibleEdges(t),
      isLast: this.isLastDepth(t),
    };
  }

  /**
   * Frames for depths 0..upTo inclusive
   */
  frames(upTo: number = this.lastDepth): FrameState[] {
    const frames: FrameState[] = [];
    for (let t = 0; t <= upTo; t++) {
      frames.push(this.frame(t));
    }
    return frames;
  }

  // Past the last layer the cumulative values stay at their final state
  private lookup<T>(byDepth: readonly T[], t: number, empty: T): T {
    assertDepth(t);
    return byDepth[Math.min(t, byDepth.length - 1)] ?? empty;
  }
}
