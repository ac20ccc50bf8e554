import { GraphStore } from '@/graph/graph-store';

/**
 * Center 0 knows 1, 2 and 3; 1 also knows 4
 */
export function createStarGraph(): GraphStore {
  return GraphStore.fromEdges([
    [0, 1],
    [0, 2],
    [0, 3],
    [1, 4],
  ]);
}

/**
 * 0 - 1 - 2 - ... - (length - 1)
 */
export function createPathGraph(length: number): GraphStore {
  const edges: Array<[number, number]> = [];
  for (let i = 1; i < length; i++) {
    edges.push([i - 1, i]);
  }
  return GraphStore.fromEdges(edges);
}
