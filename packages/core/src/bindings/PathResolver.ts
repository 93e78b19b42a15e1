/**
 * PathResolver - item ids to import-ready module paths
 *
 * Crates published behind an umbrella crate are imported through it:
 * with umbrella { prefix: 'bevy', alias: 'bevy' }, `bevy_math::Vec3`
 * becomes `bevy::math::Vec3`.
 */

import type { ItemId, UmbrellaConfig } from '@scriptwrap/types';
import { GraphError } from '../errors/ScriptwrapError.js';
import { idKey } from '../graph/items.js';
import type { TypeGraph } from '../graph/TypeGraph.js';

/**
 * Path segments of an item as recorded in the graph's path table.
 *
 * @throws GraphError (ERR_PATH_NOT_FOUND) when the table has no entry
 */
export function resolvePath(graph: TypeGraph, id: ItemId): string[] {
  const summary = graph.getSummary(id);
  if (!summary || summary.path.length === 0) {
    throw new GraphError(
      `Path not found for item ${idKey(id)} in graph rooted at ${idKey(graph.document.root)}`,
      'ERR_PATH_NOT_FOUND',
      { itemId: idKey(id), filePath: graph.sourcePath }
    );
  }
  return [...summary.path];
}

/**
 * Rewrite a leading `<prefix>_<rest>` segment to `<alias>`, `<rest>`.
 * All other segments are kept.
 */
export function toImportPath(segments: readonly string[], umbrella: UmbrellaConfig): string[] {
  const [first, ...rest] = segments;
  if (first === undefined) return [];

  const marker = `${umbrella.prefix}_`;
  if (first.startsWith(marker) && first.length > marker.length) {
    return [umbrella.alias, first.slice(marker.length), ...rest];
  }
  return [...segments];
}

/**
 * The preamble `use` line for one wrapped item.
 *
 * @param source - declaring module (crate) name
 * @param segments - path segments after the declaring module
 * @param importPath - explicit override; used verbatim when non-empty
 */
export function formatUseStatement(
  source: string,
  segments: readonly string[],
  importPath: string,
  umbrella: UmbrellaConfig
): string {
  if (importPath.length > 0) {
    return `use ${importPath};`;
  }
  return `use ${[...toImportPath([source], umbrella), ...segments].join('::')};`;
}
