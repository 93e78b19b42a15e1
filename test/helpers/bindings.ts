/**
 * Config and WrappedItem shortcuts for component tests
 */

import type { BindingConfig } from '@scriptwrap/types';
import {
  collectMembers,
  createEmitContext,
  parseBindingConfig,
  resolvePath,
  toImportPath,
  wrapperPrefix,
  type EmitContext,
  type EmitOptions,
  type TypeGraph,
  type WrappedItem,
} from '@scriptwrap/core';

export function makeConfig(raw: Record<string, unknown>): BindingConfig {
  return parseBindingConfig({ primitives: ['f32', 'bool', 'usize'], ...raw });
}

export function makeContext(config: BindingConfig, options: EmitOptions = {}): EmitContext {
  return createEmitContext(config, options);
}

/**
 * WrappedItem for a type id, configured by the entry with the same name
 */
export function wrapType(graph: TypeGraph, id: string, config: BindingConfig): WrappedItem {
  const item = graph.requireItem(id);
  const typeConfig = config.types.find(entry => entry.type === item.name);
  if (!typeConfig) {
    throw new Error(`${item.name ?? id} is not configured`);
  }
  return {
    ...collectMembers(graph, item),
    wrapperName: `${wrapperPrefix(config)}${typeConfig.type}`,
    wrappedType: typeConfig.type,
    pathComponents: toImportPath(resolvePath(graph, id), config.umbrella),
    graph,
    config: typeConfig,
    item,
    hasGlobalMethods: false,
  };
}
