/**
 * Repeated runs from different origins, summarized per degree
 */

import { createSeededRandom } from '../utils/random.js';
import type { ReadonlyGraph } from '../graph/graph-store.js';
import type { RunConfig } from './config.js';
import { SeparationError } from './errors.js';
import { SeparationRun, type RunResult } from './simulation.js';

export interface ExperimentConfig extends RunConfig {
  iterations: number;
  seed: number; // For deterministic origin selection
}

export interface DepthSummary {
  depth: number;
  runs: number;
  meanPeopleReached: number;
  meanFraction: number;
  stdDevFraction: number; // Sample standard deviation; 0 for a single run
}

export interface ExperimentResult {
  runs: RunResult[];
  summary: DepthSummary[];
}

// The seed default is read per call
const DEFAULT_CONFIG: Omit<ExperimentConfig, 'seed'> = {
  iterations: 5,
  maxDepth: 7,
  maxNodesInView: 2000,
};

/**
 * Run `iterations` independent separations, each with its own forked PRNG
 */
export function runExperiment(
  graph: ReadonlyGraph,
  config: Partial<ExperimentConfig> = {}
): ExperimentResult {
  const { iterations, seed = Date.now(), ...runConfig } = { ...DEFAULT_CONFIG, ...config };

  if (!Number.isSafeInteger(iterations) || iterations < 1) {
    throw new SeparationError(
      `Iterations must be a positive integer, got ${iterations}`,
      'INVALID_ITERATIONS'
    );
  }

  const random = createSeededRandom(seed);
  const runs: RunResult[] = [];
  for (let i = 0; i < iterations; i++) {
    runs.push(new SeparationRun(graph, runConfig, random.fork()).run());
  }

  return { runs, summary: summarizeByDepth(runs) };
}

/**
 * Aggregate metrics per depth over the runs that reached it
 */
export function summarizeByDepth(runs: readonly RunResult[]): DepthSummary[] {
  const byDepth = new Map<number, { reached: number[]; fractions: number[] }>();

  for (const run of runs) {
    for (const record of run.metrics) {
      let bucket = byDepth.get(record.depth);
      if (!bucket) {
        bucket = { reached: [], fractions: [] };
        byDepth.set(record.depth, bucket);
      }
      bucket.reached.push(record.peopleReached);
      bucket.fractions.push(record.fractionOfGraph);
    }
  }

  return Array.from(byDepth, ([depth, { reached, fractions }]) => ({
    depth,
    runs: fractions.length,
    meanPeopleReached: mean(reached),
    meanFraction: mean(fractions),
    stdDevFraction: sampleStdDev(fractions),
  })).sort((a, b) => a.depth - b.depth);
}

function mean(values: readonly number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function sampleStdDev(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const avg = mean(values);
  const squares = values.reduce((sum, value) => sum + (value - avg) ** 2, 0);
  return Math.sqrt(squares / (values.length - 1));
}
