/**
 * Degrees of separation explorer
 * Main entry point
 */

// Core exports
export { SeparationRun } from './core/simulation.js';
export type {
  MetricsRecord,
  RunResult,
  SeparationRunEvents,
  StopReason,
} from './core/simulation.js';

export { computeLayers } from './core/reachability.js';
export type { ReachabilityResult, ReachabilityStatus } from './core/reachability.js';

export { sampleNodes, induceSubgraph, sampleSubgraph } from './core/sampler.js';
export type { Subgraph } from './core/sampler.js';

export { LayerIndex } from './core/layer-index.js';
export type { FrameState } from './core/layer-index.js';

export { DEFAULT_RUN_CONFIG, resolveRunConfig } from './core/config.js';
export type { RunConfig } from './core/config.js';

export { chooseOrigin } from './core/origin.js';

export { runExperiment, summarizeByDepth } from './core/experiment.js';
export type {
  ExperimentConfig,
  ExperimentResult,
  DepthSummary,
} from './core/experiment.js';

export {
  SeparationError,
  InvalidOriginError,
  InvalidCapError,
  InvalidDepthError,
  InvalidNodeIdError,
  EmptyGraphError,
  EdgeListParseError,
  GraphLoadError,
} from './core/errors.js';

// Utility exports
export { createSeededRandom } from './utils/random.js';
export type { SeededRandom } from './utils/random.js';

export { TypedEventEmitter } from './utils/event-emitter.js';
export type { EventEmitter, EventHandler, Unsubscribe } from './utils/event-emitter.js';

// Graph exports
export {
  GraphStore,
  GraphBuilder,
  isNodeId,
  parseEdgeList,
  loadEdgeList,
} from './graph/index.js';
export type {
  ReadonlyGraph,
  Edge,
  EdgeListOptions,
  GraphLogger,
} from './graph/index.js';
