/**
 * Degree-by-degree stepper over one reachability run
 */

import { TypedEventEmitter } from '../utils/event-emitter.js';
import { createSeededRandom, type SeededRandom } from '../utils/random.js';
import type { ReadonlyGraph } from '../graph/graph-store.js';
import { resolveRunConfig, type RunConfig } from './config.js';
import { LayerIndex, type FrameState } from './layer-index.js';
import { chooseOrigin } from './origin.js';
import { computeLayers, type ReachabilityResult } from './reachability.js';
import { sampleSubgraph, type Subgraph } from './sampler.js';

export interface MetricsRecord {
  depth: number;
  peopleReached: number;
  fractionOfGraph: number; // 0..1
}

export type StopReason = 'exhausted' | 'max-depth';

export interface RunResult {
  origin: number;
  config: RunConfig;
  metrics: MetricsRecord[];
  subgraph: Subgraph;
  frames: FrameState[];
  stopReason: StopReason;
}

export type SeparationRunEvents = {
  'run:started': { origin: number; subgraph: Subgraph };
  'degree:reached': { record: MetricsRecord; frame: FrameState };
  'run:stopped': { depth: number; reason: StopReason };
};

export class SeparationRun extends TypedEventEmitter<SeparationRunEvents> {
  readonly config: RunConfig;
  readonly origin: number;
  readonly reachability: ReachabilityResult;
  readonly subgraph: Subgraph;
  readonly index: LayerIndex;

  private readonly graph: ReadonlyGraph;
  private readonly records: MetricsRecord[] = [];
  private depth = -1;
  private reason: StopReason | undefined;

  constructor(
    graph: ReadonlyGraph,
    config: Partial<RunConfig> = {},
    random: SeededRandom = createSeededRandom(Date.now())
  ) {
    super();
    this.graph = graph;
    this.config = resolveRunConfig(config);
    this.origin = chooseOrigin(graph, this.config.originId, random);
    this.reachability = computeLayers(graph, this.origin, this.config.maxDepth);
    this.subgraph = sampleSubgraph(graph, this.reachability, this.config.maxNodesInView);
    this.index = new LayerIndex(this.reachability.layers, this.subgraph);
  }

  get currentDepth(): number {
    return this.depth;
  }

  get isStopped(): boolean {
    return this.reason !== undefined;
  }

  get stopReason(): StopReason | undefined {
    return this.reason;
  }

  get metrics(): readonly MetricsRecord[] {
    return this.records;
  }

  /**
   * Advance one degree of separation. Returns false once the run has stopped.
   */
  step(): boolean {
    if (this.reason !== undefined) {
      return false;
    }

    if (this.depth < 0) {
      this.emit('run:started', { origin: this.origin, subgraph: this.subgraph });
    }

    this.depth++;
    const frame = this.index.frame(this.depth);
    const record: MetricsRecord = {
      depth: this.depth,
      peopleReached: frame.discovered.size,
      fractionOfGraph: frame.discovered.size / this.graph.nodeCount,
    };
    this.records.push(record);
    this.emit('degree:reached', { record, frame });

    if (frame.isLast) {
      this.reason = this.reachability.exhausted ? 'exhausted' : 'max-depth';
      this.emit('run:stopped', { depth: this.depth, reason: this.reason });
    }

    return true;
  }

  /**
   * Step until no new people are reached or the depth limit is hit
   */
  run(): RunResult {
    while (this.step()) {
      // advance
    }
    return this.result();
  }

  result(): RunResult {
    if (this.reason === undefined) {
      throw new Error('Run has not finished yet');
    }
    return {
      origin: this.origin,
      config: this.config,
      metrics: [...this.records],
      subgraph: this.subgraph,
      frames: this.index.frames(),
      stopReason: this.reason,
    };
  }
}
