/**
 * Generator - entry point of a binding generation run
 *
 * Matches the configured type names against the union of the given type
 * graphs, builds one WrappedItem per match and writes the descriptor file
 * contents: preamble, one block per type in configuration order, then the
 * registration scaffolding.
 *
 * Usage:
 *   const graphs = loadTypeGraphs(['bevy_math.json'], logger);
 *   const { config } = loadBindingConfig('bindings.yaml');
 *   const text = generateBindings(graphs, config, { printErrors: true, logger });
 */

import type { BindingConfig, GraphItem, TypeConfig } from '@scriptwrap/types';
import { UnmatchedTypesError } from './errors/ScriptwrapError.js';
import { itemKind } from './graph/items.js';
import type { TypeGraph } from './graph/TypeGraph.js';
import { isTestedGraphFormat, MAX_GRAPH_FORMAT_VERSION, MIN_GRAPH_FORMAT_VERSION } from './version.js';
import { collectMembers, type WrappedItem } from './bindings/MemberCollector.js';
import { formatUseStatement, resolvePath, toImportPath } from './bindings/PathResolver.js';
import { DescriptorWriter } from './emit/DescriptorWriter.js';
import { createEmitContext, type EmitContext, type EmitOptions } from './emit/EmitContext.js';
import { emitBinding } from './emit/BindingEmitter.js';
import { emitScaffolding, wrapperPrefix } from './emit/Scaffolding.js';

export const FILE_HEADER = '#![allow(clippy::all,unused_imports)]';

export type GenerateOptions = EmitOptions;

interface TypeMatch {
  graph: TypeGraph;
  key: string;
  item: GraphItem;
  config: TypeConfig;
  /** Position in `config.types` */
  order: number;
}

function matchesSource(graph: TypeGraph, key: string, source: string): boolean {
  if (source.length === 0) return true;
  return graph.getSummary(key)?.path[0] === source;
}

/**
 * Find the single struct or enum for every configured name.
 *
 * @throws UnmatchedTypesError listing every missing and ambiguous name
 */
export function matchTypes(graphs: readonly TypeGraph[], config: BindingConfig): TypeMatch[] {
  const byName = new Map<string, { typeConfig: TypeConfig; order: number }>(config.types.map((typeConfig, order) => [typeConfig.type, { typeConfig, order }]));
  const found = new Map<string, TypeMatch[]>();

  for (const graph of graphs) {
    for (const [key, item] of graph.items()) {
      if (item.name === null) continue;
      const configured = byName.get(item.name);
      if (!configured) continue;
      const kind = itemKind(item);
      if (kind !== 'struct' && kind !== 'enum') continue;
      if (!matchesSource(graph, key, configured.typeConfig.source)) continue;

      const match: TypeMatch = { graph, key, item, config: configured.typeConfig, order: configured.order };
      const existing = found.get(item.name);
      if (existing) {
        existing.push(match);
      } else {
        found.set(item.name, [match]);
      }
    }
  }

  const missing = config.types.map(t => t.type).filter(name => !found.has(name));
  const ambiguous = config.types.map(t => t.type).filter(name => (found.get(name)?.length ?? 0) > 1);
  if (missing.length > 0 || ambiguous.length > 0) {
    throw new UnmatchedTypesError(missing, ambiguous);
  }

  const matches: TypeMatch[] = [];
  for (const list of found.values()) {
    matches.push(...list);
  }
  // configuration order, never graph order
  return matches.sort((a, b) => a.order - b.order);
}

function buildWrappedItem(match: TypeMatch, config: BindingConfig): { item: WrappedItem; useLine: string } {
  const rawPath = resolvePath(match.graph, match.key);
  const name = match.config.type;
  const item: WrappedItem = {
    ...collectMembers(match.graph, match.item),
    wrapperName: `${wrapperPrefix(config)}${name}`,
    wrappedType: name,
    pathComponents: toImportPath(rawPath, config.umbrella),
    graph: match.graph,
    config: match.config,
    item: match.item,
    hasGlobalMethods: false,
  };
  const source = match.config.source.length > 0 ? match.config.source : rawPath[0] ?? '';
  const useLine = formatUseStatement(source, rawPath.slice(1), match.config.importPath, config.umbrella);
  return { item, useLine };
}

function reportGraphFormats(graphs: readonly TypeGraph[], ctx: EmitContext): void {
  for (const graph of graphs) {
    if (!isTestedGraphFormat(graph.formatVersion)) {
      ctx.diagnostics.add({
        code: 'GRAPH_FORMAT_UNTESTED',
        severity: 'warning',
        message: `${graph.label} uses type graph format ${graph.formatVersion}, outside the tested range ${MIN_GRAPH_FORMAT_VERSION}-${MAX_GRAPH_FORMAT_VERSION}`,
      });
    }
  }
}

/**
 * Generate the descriptor file for a configuration.
 *
 * Recoverable outcomes go to `options.diagnostics`; fatal problems throw.
 */
export function generateBindings(graphs: readonly TypeGraph[], config: BindingConfig, options: GenerateOptions = {}): string {
  const ctx = createEmitContext(config, options);
  reportGraphFormats(graphs, ctx);

  const matches = matchTypes(graphs, config);
  ctx.logger.info('Matched configured types', { count: matches.length, graphs: graphs.length });

  const built = matches.map(match => buildWrappedItem(match, config));
  const items = built.map(entry => entry.item);

  const writer = new DescriptorWriter();
  writer.line(FILE_HEADER);
  writer.text(config.imports);
  writer.lines(built.map(entry => entry.useLine));

  for (const item of items) {
    emitBinding(writer, item, ctx);
  }

  writer.text(config.other);
  emitScaffolding(writer, items, ctx);

  ctx.logger.debug('Generation finished', {
    lines: writer.lineCount,
    globals: items.filter(item => item.hasGlobalMethods).map(item => item.wrappedType),
  });
  return writer.toString();
}
