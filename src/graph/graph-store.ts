/**
 * Immutable in-memory social graph
 * Built through ngraph.graph, then frozen into adjacency arrays indexed by id rank
 */

import createGraph, { type Graph, type NodeId } from 'ngraph.graph';
import { aStar, type PathFinder } from 'ngraph.path';
import { InvalidNodeIdError } from '../core/errors.js';

/** Undirected edge, smaller id first */
export type Edge = readonly [number, number];

/**
 * Read-only view of an undirected graph over non-negative integer ids
 */
export interface ReadonlyGraph {
  readonly nodeCount: number;
  readonly edgeCount: number;
  readonly isEmpty: boolean;
  nodes(): readonly number[];
  neighbors(id: number): readonly number[];
  degree(id: number): number;
  contains(id: number): boolean;
  /** Dense position of `id` in `nodes()`, or -1; sizes per-run arrays */
  indexOf(id: number): number;
  edges(): readonly Edge[];
}

type SocialGraph = Graph<undefined, undefined>;

const NO_NEIGHBORS: readonly number[] = Object.freeze([]);

export function isNodeId(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}

function toNodeId(id: NodeId): number {
  if (!isNodeId(id)) {
    throw new InvalidNodeIdError(id);
  }
  return id;
}

/**
 * Accumulates nodes and edges, then freezes them into a GraphStore.
 * Repeated edges (either orientation) are kept once; self-loops only register the node.
 */
export class GraphBuilder {
  private graph: SocialGraph | undefined = createGraph<undefined, undefined>();
  private selfLoops = 0;

  addNode(id: number): this {
    const graph = this.requireGraph();
    if (!graph.hasNode(toNodeId(id))) {
      graph.addNode(id);
    }
    return this;
  }

  addEdge(from: number, to: number): this {
    const graph = this.requireGraph();
    toNodeId(from);
    toNodeId(to);

    if (from === to) {
      this.selfLoops++;
      return this.addNode(from);
    }

    if (!graph.hasLink(from, to) && !graph.hasLink(to, from)) {
      graph.addLink(from, to);
    }
    return this;
  }

  /**
   * Number of self-referencing edges seen so far
   */
  get selfLoopCount(): number {
    return this.selfLoops;
  }

  /**
   * Freeze the accumulated graph. The builder cannot be used afterwards.
   */
  build(): GraphStore {
    const graph = this.requireGraph();
    this.graph = undefined;
    return GraphStore.fromGraph(graph);
  }

  private requireGraph(): SocialGraph {
    if (!this.graph) {
      throw new Error('GraphBuilder has already been built');
    }
    return this.graph;
  }
}

export class GraphStore implements ReadonlyGraph {
  private pathFinder: PathFinder<undefined> | undefined;

  private constructor(
    private readonly graph: SocialGraph,
    private readonly ids: readonly number[],
    private readonly slots: ReadonlyMap<number, number>,
    private readonly adjacency: ReadonlyArray<readonly number[]>,
    private readonly edgeList: readonly Edge[],
  ) {}

  /**
   * Snapshot an ngraph graph whose node ids are all non-negative integers.
   * Ids may be sparse; storage is indexed by each id's rank.
   */
  static fromGraph(graph: SocialGraph): GraphStore {
    const ids: number[] = [];
    graph.forEachNode(node => {
      ids.push(toNodeId(node.id));
    });
    ids.sort((a, b) => a - b);

    const slots = new Map<number, number>();
    ids.forEach((id, slot) => slots.set(id, slot));

    const adjacency: Array<readonly number[]> = [];
    const edges: Edge[] = [];

    for (const id of ids) {
      const links = graph.getLinks(id);
      if (!links) {
        adjacency.push(NO_NEIGHBORS);
        continue;
      }

      const neighbors: number[] = [];
      for (const link of links) {
        const other = link.fromId === id ? link.toId : link.fromId;
        neighbors.push(toNodeId(other));
      }
      neighbors.sort((a, b) => a - b);
      adjacency.push(Object.freeze(neighbors));

      for (const neighbor of neighbors) {
        if (neighbor > id) {
          const edge: Edge = [id, neighbor];
          Object.freeze(edge);
          edges.push(edge);
        }
      }
    }

    return new GraphStore(
      graph,
      Object.freeze(ids),
      slots,
      Object.freeze(adjacency),
      Object.freeze(edges),
    );
  }

  /**
   * Convenience constructor for tests and small in-memory graphs
   */
  static fromEdges(edges: Iterable<readonly [number, number]>, isolated: Iterable<number> = []): GraphStore {
    const builder = new GraphBuilder();
    for (const id of isolated) {
      builder.addNode(id);
    }
    for (const [from, to] of edges) {
      builder.addEdge(from, to);
    }
    return builder.build();
  }

  get nodeCount(): number {
    return this.ids.length;
  }

  get edgeCount(): number {
    return this.edgeList.length;
  }

  get isEmpty(): boolean {
    return this.ids.length === 0;
  }

  /**
   * Node ids ascending; the array is frozen
   */
  nodes(): readonly number[] {
    return this.ids;
  }

  indexOf(id: number): number {
    return this.slots.get(id) ?? -1;
  }

  contains(id: number): boolean {
    return this.slots.has(id);
  }

  neighbors(id: number): readonly number[] {
    return this.adjacency[this.indexOf(id)] ?? NO_NEIGHBORS;
  }

  degree(id: number): number {
    return this.neighbors(id).length;
  }

  /**
   * Every undirected edge once, sorted by (smaller id, larger id)
   */
  edges(): readonly Edge[] {
    return this.edgeList;
  }

  /**
   * Find one shortest chain of acquaintances between two people.
   * Returns ids from `from` to `to`, or an empty array when they are not connected.
   */
  findPath(from: number, to: number): number[] {
    if (!this.contains(from) || !this.contains(to)) {
      return [];
    }
    if (from === to) {
      return [from];
    }

    if (!this.pathFinder) {
      this.pathFinder = aStar<undefined, undefined>(this.graph, {
        oriented: false,
        distance: () => 1,
      });
    }

    const path = this.pathFinder.find(from, to);
    // ngraph.path lists the destination first
    return path.map(node => toNodeId(node.id)).reverse();
  }
}
