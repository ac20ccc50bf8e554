import { describe, it, expect } from 'vitest';
import { computeLayers } from '@/core/reachability';
import { InvalidDepthError, InvalidOriginError } from '@/core/errors';
import { GraphBuilder, GraphStore } from '@/graph/graph-store';
import { createSeededRandom } from '@/utils/random';
import { createPathGraph, createStarGraph } from '../fixtures';

/**
 * All-pairs hop counts by Floyd-Warshall, Infinity when unreachable
 */
function bruteForceDistances(graph: GraphStore): number[][] {
  const n = (graph.nodes().at(-1) ?? -1) + 1;
  const dist = Array.from({ length: n }, (_, i) =>
    Array.from({ length: n }, (_, j) => (i === j ? 0 : Infinity))
  );
  for (const [u, v] of graph.edges()) {
    const rowU = dist[u];
    const rowV = dist[v];
    if (rowU && rowV) {
      rowU[v] = 1;
      rowV[u] = 1;
    }
  }
  for (let k = 0; k < n; k++) {
    for (let i = 0; i < n; i++) {
      for (let j = 0; j < n; j++) {
        const viaK = (dist[i]?.[k] ?? Infinity) + (dist[k]?.[j] ?? Infinity);
        const row = dist[i];
        if (row && viaK < (row[j] ?? Infinity)) {
          row[j] = viaK;
        }
      }
    }
  }
  return dist;
}

function createRandomGraph(seed: number, nodeCount: number, edgeProbability: number): GraphStore {
  const random = createSeededRandom(seed);
  const builder = new GraphBuilder();
  for (let u = 0; u < nodeCount; u++) {
    builder.addNode(u);
    for (let v = u + 1; v < nodeCount; v++) {
      if (random.next() < edgeProbability) {
        builder.addEdge(u, v);
      }
    }
  }
  return builder.build();
}

describe('computeLayers', () => {
  describe('layering', () => {
    it('should layer the star graph by degree of separation', () => {
      const result = computeLayers(createStarGraph(), 0, 3);

      expect(result.status).toBe('ok');
      expect(result.origin).toBe(0);
      expect(result.layers).toEqual([[0], [1, 2, 3], [4]]);
      expect(result.reachedCount).toBe(5);
      expect(Array.from(result.distances)).toEqual([
        [0, 0],
        [1, 1],
        [2, 1],
        [3, 1],
        [4, 2],
      ]);
    });

    it('should stop without emitting an empty layer once growth ends', () => {
      const result = computeLayers(createStarGraph(), 0, 3);

      expect(result.exhausted).toBe(true);
      expect(result.stopDepth).toBe(3);
      expect(result.layers).toHaveLength(3);
    });

    it('should stop at the depth limit while the frontier is still growing', () => {
      const result = computeLayers(createPathGraph(5), 0, 2);

      expect(result.layers).toEqual([[0], [1], [2]]);
      expect(result.exhausted).toBe(false);
      expect(result.stopDepth).toBe(2);
      expect(result.distances.has(3)).toBe(false);
    });

    it('should return only the origin for depth 0', () => {
      const result = computeLayers(createStarGraph(), 1, 0);

      expect(result.layers).toEqual([[1]]);
      expect(result.exhausted).toBe(false);
      expect(result.stopDepth).toBe(0);
    });

    it('should report an isolated origin as exhausted at depth 1', () => {
      const graph = GraphStore.fromEdges([[0, 1]], [5]);
      const result = computeLayers(graph, 5, 4);

      expect(result.layers).toEqual([[5]]);
      expect(result.exhausted).toBe(true);
      expect(result.stopDepth).toBe(1);
    });

    it('should leave other components out of the distance map', () => {
      const graph = GraphStore.fromEdges([
        [0, 1],
        [2, 3],
      ]);
      const result = computeLayers(graph, 0, 5);

      expect(Array.from(result.distances.keys())).toEqual([0, 1]);
      expect(result.layers).toEqual([[0], [1]]);
    });

    it('should assign a node reachable along several paths to its first depth', () => {
      // 0-1-3 and 0-2-3, plus 3-4 and 1-4
      const graph = GraphStore.fromEdges([
        [0, 1],
        [0, 2],
        [1, 3],
        [2, 3],
        [3, 4],
        [1, 4],
      ]);
      const result = computeLayers(graph, 0, 5);

      expect(result.layers).toEqual([[0], [1, 2], [3, 4]]);
    });
  });

  describe('agreement with brute-force shortest paths', () => {
    const graph = createRandomGraph(2024, 30, 0.08);
    const expected = bruteForceDistances(graph);

    it('should match every hop count within the cutoff', () => {
      for (const origin of graph.nodes()) {
        const maxDepth = 4;
        const result = computeLayers(graph, origin, maxDepth);
        const row = expected[origin] ?? [];

        for (const node of graph.nodes()) {
          const trueDistance = row[node] ?? Infinity;
          if (trueDistance <= maxDepth) {
            expect(result.distances.get(node)).toBe(trueDistance);
          } else {
            expect(result.distances.has(node)).toBe(false);
          }
        }
      }
    });

    it('should partition the reached set into disjoint sorted layers', () => {
      for (const origin of graph.nodes()) {
        const result = computeLayers(graph, origin, 10);
        const seen = new Set<number>();

        result.layers.forEach((layer, depth) => {
          expect([...layer].sort((a, b) => a - b)).toEqual(layer);
          for (const node of layer) {
            expect(seen.has(node)).toBe(false);
            seen.add(node);
            expect(result.distances.get(node)).toBe(depth);
          }
        });

        expect(seen.size).toBe(result.distances.size);
      }
    });

    it('should agree with the path finder on chain length', () => {
      const origin = graph.nodes()[0] ?? 0;
      const result = computeLayers(graph, origin, 30);

      for (const [node, distance] of result.distances) {
        expect(graph.findPath(origin, node)).toHaveLength(distance + 1);
      }
    });
  });

  describe('errors and degenerate graphs', () => {
    it('should reject an origin that is not in the graph', () => {
      const graph = GraphStore.fromEdges([[0, 5]]);

      expect(() => computeLayers(graph, 9, 3)).toThrow(InvalidOriginError);
      expect(() => computeLayers(graph, 3, 3)).toThrow(InvalidOriginError);
    });

    it('should reject negative or fractional depths', () => {
      const graph = createStarGraph();

      expect(() => computeLayers(graph, 0, -1)).toThrow(InvalidDepthError);
      expect(() => computeLayers(graph, 0, 1.5)).toThrow(InvalidDepthError);
    });

    it('should surface an empty graph as a result state', () => {
      const result = computeLayers(new GraphBuilder().build(), 0, 3);

      expect(result.status).toBe('empty-graph');
      expect(result.origin).toBeUndefined();
      expect(result.layers).toEqual([]);
      expect(result.distances.size).toBe(0);
      expect(result.reachedCount).toBe(0);
    });
  });
});
