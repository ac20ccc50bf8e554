/**
 * Error hierarchy for reachability runs and graph loading
 */

export class SeparationError extends Error {
  constructor(
    message: string,
    readonly code: string,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'SeparationError';
  }
}

export class InvalidOriginError extends SeparationError {
  constructor(readonly originId: number) {
    super(`Origin ${originId} is not a node of the graph`, 'INVALID_ORIGIN');
    this.name = 'InvalidOriginError';
  }
}

export class InvalidCapError extends SeparationError {
  constructor(readonly cap: number) {
    super(`Node cap must be a positive integer, got ${cap}`, 'INVALID_CAP');
    this.name = 'InvalidCapError';
  }
}

export class InvalidDepthError extends SeparationError {
  constructor(readonly depth: number, expectation = 'a non-negative integer') {
    super(`Depth must be ${expectation}, got ${depth}`, 'INVALID_DEPTH');
    this.name = 'InvalidDepthError';
  }
}

export class InvalidNodeIdError extends SeparationError {
  constructor(readonly nodeId: unknown) {
    super(`Node id must be a non-negative integer, got ${String(nodeId)}`, 'INVALID_NODE_ID');
    this.name = 'InvalidNodeIdError';
  }
}

export class EmptyGraphError extends SeparationError {
  constructor() {
    super('Graph has no nodes', 'EMPTY_GRAPH');
    this.name = 'EmptyGraphError';
  }
}

export class EdgeListParseError extends SeparationError {
  constructor(
    readonly line: number,
    readonly content: string,
  ) {
    super(`Malformed edge on line ${line}: "${content}"`, 'EDGE_LIST_PARSE');
    this.name = 'EdgeListParseError';
  }
}

export class GraphLoadError extends SeparationError {
  constructor(readonly path: string, cause: unknown) {
    super(`Cannot load edge list ${path}: ${describeCause(cause)}`, 'GRAPH_LOAD', cause);
    this.name = 'GraphLoadError';
  }
}


function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
