/**
 * scriptwrap version constants.
 *
 * Reads the version from the @scriptwrap/core package.json at module load.
 */
import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readPackageVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

/** Full version string (e.g., "0.3.0") */
export const SCRIPTWRAP_VERSION: string = readPackageVersion();

/**
 * rustdoc JSON format versions the generator has been exercised against.
 * Documents outside the range are still read; a warning is logged.
 */
export const MIN_GRAPH_FORMAT_VERSION = 20;
export const MAX_GRAPH_FORMAT_VERSION = 45;

export function isTestedGraphFormat(formatVersion: number): boolean {
  return formatVersion >= MIN_GRAPH_FORMAT_VERSION && formatVersion <= MAX_GRAPH_FORMAT_VERSION;
}
