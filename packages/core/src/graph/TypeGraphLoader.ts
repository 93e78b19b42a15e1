/**
 * TypeGraphLoader - reads rustdoc JSON documents from disk
 *
 * Only the top level of a document is validated; item payloads are trusted
 * to follow the rustdoc format. Format versions are not checked here;
 * generateBindings records untested ones as diagnostics.
 */

import { readFileSync } from 'fs';
import { resolve } from 'path';
import AjvModule from 'ajv';
import type { SchemaObject } from 'ajv';
import type { TypeGraphDocument } from '@scriptwrap/types';
import { FileAccessError, GraphError } from '../errors/ScriptwrapError.js';
import { silentLogger, type Logger } from '../logging/Logger.js';
import { TypeGraph } from './TypeGraph.js';

const Ajv = AjvModule.default;

const TYPE_GRAPH_SCHEMA: SchemaObject = {
  type: 'object',
  required: ['root', 'index', 'paths', 'format_version'],
  properties: {
    root: { type: ['string', 'integer'] },
    index: { type: 'object' },
    paths: { type: 'object' },
    format_version: { type: 'integer' },
  },
};

const validateDocument = new Ajv({ allErrors: true }).compile<TypeGraphDocument>(TYPE_GRAPH_SCHEMA);

/**
 * Validate a parsed document and wrap it.
 *
 * @throws GraphError when the top-level shape is wrong
 */
export function parseTypeGraph(raw: unknown, sourcePath?: string): TypeGraph {
  if (!validateDocument(raw)) {
    const problems = (validateDocument.errors ?? []).map(e => `${e.instancePath || '(root)'} ${e.message ?? e.keyword}`);
    throw new GraphError(
      `Not a type graph document: ${problems.join('; ')}`,
      'ERR_GRAPH_INVALID',
      { filePath: sourcePath },
      'Generate the document with: cargo rustdoc -- -Z unstable-options --output-format json'
    );
  }

  return new TypeGraph(raw, sourcePath);
}

/**
 * Read and parse one type graph file.
 *
 * @throws FileAccessError when the file cannot be read
 * @throws GraphError when it is not valid JSON or not a type graph
 */
export function loadTypeGraph(filePath: string, logger: Logger = silentLogger): TypeGraph {
  const absolutePath = resolve(filePath);

  let content: string;
  try {
    content = readFileSync(absolutePath, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new FileAccessError(
      `Cannot read type graph: ${message}`,
      'ERR_FILE_UNREADABLE',
      { filePath: absolutePath }
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new GraphError(
      `Type graph is not valid JSON: ${message}`,
      'ERR_GRAPH_INVALID',
      { filePath: absolutePath }
    );
  }

  const graph = parseTypeGraph(raw, absolutePath);
  logger.debug('Loaded type graph', {
    file: absolutePath,
    crate: graph.crateName,
    items: Object.keys(graph.document.index).length,
    formatVersion: graph.formatVersion,
  });
  return graph;
}

/**
 * Load several documents; together they form one logical graph.
 */
export function loadTypeGraphs(filePaths: string[], logger: Logger = silentLogger): TypeGraph[] {
  return filePaths.map(filePath => loadTypeGraph(filePath, logger));
}
