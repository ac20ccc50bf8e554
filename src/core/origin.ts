/**
 * Origin selection policy
 */

import type { ReadonlyGraph } from '../graph/graph-store.js';
import type { SeededRandom } from '../utils/random.js';
import { EmptyGraphError, InvalidOriginError } from './errors.js';

/**
 * Use the requested origin if given, otherwise draw one uniformly from the graph.
 * A requested id missing from the graph is an error, never silently replaced.
 */
export function chooseOrigin(
  graph: ReadonlyGraph,
  requested: number | undefined,
  random: SeededRandom
): number {
  if (graph.isEmpty) {
    throw new EmptyGraphError();
  }

  if (requested !== undefined) {
    if (!graph.contains(requested)) {
      throw new InvalidOriginError(requested);
    }
    return requested;
  }

  return random.nextChoice(graph.nodes());
}
