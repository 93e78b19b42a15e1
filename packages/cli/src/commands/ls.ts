/**
 * List command - List the structs and enums of type graphs
 *
 * Shows the names a binding config can refer to, with the path used to
 * tell same-named types apart (`source`).
 */

import { Command } from 'commander';
import { itemKind, loadTypeGraphs, type TypeGraph } from '@scriptwrap/core';
import { exitWithCommandError } from '../utils/errorFormatter.js';

interface LsOptions {
  filter?: string;
  json?: boolean;
}

export interface TypeListing {
  name: string;
  kind: 'struct' | 'enum';
  path: string;
  /** Graph file the type was found in */
  graph: string;
}

/**
 * Structs and enums of all graphs, sorted by path then graph.
 *
 * @param filter - case-insensitive substring of the path
 */
export function listTypes(graphs: readonly TypeGraph[], filter?: string): TypeListing[] {
  const needle = filter?.toLowerCase();
  const listings: TypeListing[] = [];

  for (const graph of graphs) {
    for (const [key, item] of graph.items()) {
      const kind = itemKind(item);
      if ((kind !== 'struct' && kind !== 'enum') || item.name === null) continue;
      const path = graph.getSummary(key)?.path.join('::') ?? item.name;
      if (needle && !path.toLowerCase().includes(needle)) continue;
      listings.push({ name: item.name, kind, path, graph: graph.label });
    }
  }

  return listings.sort((a, b) => a.path.localeCompare(b.path) || a.graph.localeCompare(b.graph));
}

export function formatListing(listing: TypeListing): string {
  return `${listing.kind.padEnd(6)} ${listing.path}`;
}

export const lsCommand = new Command('ls')
  .description('List structs and enums in type graphs')
  .argument('<graphs...>', 'rustdoc JSON files')
  .option('-f, --filter <text>', 'Only types whose path contains this text')
  .option('-j, --json', 'Output as JSON')
  .addHelpText('after', `
Examples:
  scriptwrap ls bevy_math.json                  List every struct and enum
  scriptwrap ls bevy_math.json --filter vec     Only paths containing "vec"
  scriptwrap ls bevy_math.json --json           Output as JSON
`)
  .action((graphPaths: string[], options: LsOptions) => {
    let listings: TypeListing[];
    try {
      listings = listTypes(loadTypeGraphs(graphPaths), options.filter);
    } catch (err) {
      exitWithCommandError(err);
    }

    if (options.json) {
      console.log(JSON.stringify({ types: listings, total: listings.length }, null, 2));
      return;
    }

    console.log(`[types] (${listings.length}):`);
    console.log('');
    for (const listing of listings) {
      console.log(`  ${formatListing(listing)}`);
    }
  });
