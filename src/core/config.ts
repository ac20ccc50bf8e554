/**
 * Run configuration
 */

import { InvalidDepthError } from './errors.js';
import { assertCap } from './sampler.js';

export interface RunConfig {
  originId?: number;   // Absent: origin policy picks one with the run's PRNG
  maxDepth: number;    // Degrees of separation to explore
  maxNodesInView: number; // Cap on the rendered subgraph
}

export const DEFAULT_RUN_CONFIG: RunConfig = {
  maxDepth: 6,
  maxNodesInView: 2000,
};

/**
 * Merge overrides onto the defaults and validate the result
 */
export function resolveRunConfig(config: Partial<RunConfig> = {}): RunConfig {
  const resolved: RunConfig = { ...DEFAULT_RUN_CONFIG, ...config };

  if (!Number.isSafeInteger(resolved.maxDepth) || resolved.maxDepth < 1) {
    throw new InvalidDepthError(resolved.maxDepth, 'a positive integer');
  }
  assertCap(resolved.maxNodesInView);

  return resolved;
}
