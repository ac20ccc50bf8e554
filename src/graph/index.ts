/**
 * Graph module
 *
 * This module provides:
 * - GraphStore: frozen undirected graph with id-indexed adjacency and path queries
 * - GraphBuilder: incremental construction backed by ngraph.graph
 * - Edge-list parsing and loading from disk
 */

export {
  GraphStore,
  GraphBuilder,
  isNodeId,
  type ReadonlyGraph,
  type Edge,
} from './graph-store.js';

export {
  parseEdgeList,
  loadEdgeList,
  type EdgeListOptions,
  type GraphLogger,
} from './edge-list.js';
