/**
 * Edge-list loader
 *
 * Format: one undirected edge per line, two whitespace-separated integer ids.
 * Blank lines and `#` comments are skipped; extra columns are ignored.
 */

import { readFile } from 'node:fs/promises';
import { EdgeListParseError, GraphLoadError } from '../core/errors.js';
import { GraphBuilder, type GraphStore } from './graph-store.js';

export type GraphLogger = Pick<Console, 'info' | 'warn'>;

export interface EdgeListOptions {
  logger: GraphLogger;
  commentPrefix: string;
}

const DEFAULT_OPTIONS: EdgeListOptions = {
  logger: console,
  commentPrefix: '#',
};

const NODE_ID_PATTERN = /^\d+$/;

function parseNodeId(token: string | undefined): number | undefined {
  if (token === undefined || !NODE_ID_PATTERN.test(token)) {
    return undefined;
  }
  const id = Number(token);
  return Number.isSafeInteger(id) ? id : undefined;
}

/**
 * Parse edge-list text into a frozen graph
 */
export function parseEdgeList(
  text: string,
  options: Partial<EdgeListOptions> = {}
): GraphStore {
  const { logger, commentPrefix } = { ...DEFAULT_OPTIONS, ...options };
  const builder = new GraphBuilder();
  const lines = text.split(/\r?\n/);

  lines.forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (line === '' || line.startsWith(commentPrefix)) return;

    const [first, second] = line.split(/\s+/);
    const from = parseNodeId(first);
    const to = parseNodeId(second);
    if (from === undefined || to === undefined) {
      throw new EdgeListParseError(index + 1, line);
    }
    builder.addEdge(from, to);
  });

  if (builder.selfLoopCount > 0) {
    logger.warn(`Ignored ${builder.selfLoopCount} self-referencing edge(s)`);
  }

  return builder.build();
}

/**
 * Read an edge-list file from disk
 */
export async function loadEdgeList(
  path: string,
  options: Partial<EdgeListOptions> = {}
): Promise<GraphStore> {
  const logger = options.logger ?? DEFAULT_OPTIONS.logger;

  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new GraphLoadError(path, error);
  }

  const graph = parseEdgeList(text, options);
  logger.info(`Loaded graph: ${graph.nodeCount} nodes, ${graph.edgeCount} edges`);
  return graph;
}
