import { readFileSync } from 'fs';
import { dirname, extname, resolve } from 'path';
import { parse as parseYAML } from 'yaml';
import AjvModule from 'ajv';
import type { ErrorObject } from 'ajv';
import type { BindingConfig, TypeConfig, TypeTables } from '@scriptwrap/types';
import { ConfigError, FileAccessError } from '../errors/ScriptwrapError.js';
import { BINDING_CONFIG_SCHEMA, type RawBindingConfig, type RawTypeConfig } from './schema.js';

/**
 * Binding configuration loader.
 *
 * Example bindings.yaml:
 *
 * ```yaml
 * outputFile: src/generated.rs
 * apiName: Bevy
 * primitives: [f32, bool, usize, String]
 *
 * externalTypes:
 *   - name: LuaWorld
 *     proxyName: world
 *     includeGlobalProxy: true
 *
 * types:
 *   - type: Vec3
 *     source: bevy_math
 *     traits:
 *       - name: Add
 *         importPath: std::ops::Add
 *   - type: Transform
 *     source: bevy_transform
 *     doc: "Position, rotation and scale of an entity"
 * ```
 *
 * The order of `types` is the order of the generated blocks.
 */

// ajv ships CommonJS; under ESM the default import is module.exports
const Ajv = AjvModule.default;

/**
 * Defaults for everything but `types`.
 */
export const DEFAULT_CONFIG: Omit<BindingConfig, 'types'> = {
  outputFile: 'generated.rs',
  apiName: 'Api',
  language: 'lua',
  macroName: 'impl_script_newtype',
  requiredFeatures: [],
  umbrella: { prefix: 'bevy', alias: 'bevy' },
  imports: '',
  other: '',
  apiDefaults: '',
  primitives: [],
  wrappedTypes: [],
  externalTypes: [],
};

export interface LoadedConfig {
  config: BindingConfig;
  /** Absolute path of the config file */
  configPath: string;
  /** Directory relative paths in the config resolve against */
  baseDir: string;
}

const validateRawConfig = new Ajv({ allErrors: true }).compile<RawBindingConfig>(BINDING_CONFIG_SCHEMA);

function formatSchemaError(error: ErrorObject): string {
  const location = error.instancePath || '(root)';
  if (error.keyword === 'additionalProperties') {
    return `${location}: unknown property "${String(error.params.additionalProperty)}"`;
  }
  return `${location}: ${error.message ?? error.keyword}`;
}

/**
 * Load and validate a binding config from a YAML (.yaml/.yml) or JSON file.
 *
 * @throws FileAccessError when the file cannot be read
 * @throws ConfigError on syntax errors, schema violations or duplicate types
 */
export function loadBindingConfig(configPath: string): LoadedConfig {
  const absolutePath = resolve(configPath);

  let content: string;
  try {
    content = readFileSync(absolutePath, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new FileAccessError(
      `Cannot read binding config: ${message}`,
      'ERR_FILE_UNREADABLE',
      { filePath: absolutePath },
      'Pass the config path with --config'
    );
  }

  let raw: unknown;
  try {
    raw = extname(absolutePath) === '.json' ? JSON.parse(content) : parseYAML(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(
      `Failed to parse binding config: ${message}`,
      'ERR_CONFIG_PARSE',
      { filePath: absolutePath }
    );
  }

  return {
    config: parseBindingConfig(raw, absolutePath),
    configPath: absolutePath,
    baseDir: dirname(absolutePath),
  };
}

/**
 * Validate an already parsed config document and merge it with defaults.
 *
 * All schema violations are reported in a single ConfigError.
 */
export function parseBindingConfig(raw: unknown, filePath = '<inline>'): BindingConfig {
  if (!validateRawConfig(raw)) {
    const problems = (validateRawConfig.errors ?? []).map(formatSchemaError);
    throw new ConfigError(
      `Invalid binding config:\n  ${problems.join('\n  ')}`,
      'ERR_CONFIG_INVALID',
      { filePath, problems }
    );
  }

  validateUniqueTypes(raw.types, filePath);

  return mergeConfig(raw);
}

/**
 * Type names key the output order, so each may appear once.
 * THROWS with every duplicate listed.
 */
export function validateUniqueTypes(types: RawTypeConfig[], filePath = '<inline>'): void {
  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const entry of types) {
    if (seen.has(entry.type) && !duplicates.includes(entry.type)) {
      duplicates.push(entry.type);
    }
    seen.add(entry.type);
  }

  if (duplicates.length > 0) {
    throw new ConfigError(
      `Types configured more than once: ${duplicates.join(', ')}`,
      'ERR_CONFIG_DUPLICATE_TYPE',
      { filePath, duplicates },
      'Merge the duplicate entries into one'
    );
  }
}

function mergeTypeConfig(raw: RawTypeConfig): TypeConfig {
  return {
    type: raw.type,
    source: raw.source ?? '',
    importPath: raw.importPath ?? '',
    doc: raw.doc,
    requiredFeatures: raw.requiredFeatures ?? [],
    traits: raw.traits ?? [],
    deriveFlags: raw.deriveFlags ?? [],
    extraMethods: raw.extraMethods ?? [],
  };
}

function mergeConfig(user: RawBindingConfig): BindingConfig {
  return {
    outputFile: user.outputFile ?? DEFAULT_CONFIG.outputFile,
    apiName: user.apiName ?? DEFAULT_CONFIG.apiName,
    language: user.language ?? DEFAULT_CONFIG.language,
    macroName: user.macroName ?? DEFAULT_CONFIG.macroName,
    requiredFeatures: user.requiredFeatures ?? DEFAULT_CONFIG.requiredFeatures,
    umbrella: user.umbrella ?? DEFAULT_CONFIG.umbrella,
    imports: user.imports ?? DEFAULT_CONFIG.imports,
    other: user.other ?? DEFAULT_CONFIG.other,
    apiDefaults: user.apiDefaults ?? DEFAULT_CONFIG.apiDefaults,
    primitives: user.primitives ?? DEFAULT_CONFIG.primitives,
    wrappedTypes: user.wrappedTypes ?? DEFAULT_CONFIG.wrappedTypes,
    externalTypes: (user.externalTypes ?? []).map(ext => ({
      name: ext.name,
      proxyName: ext.proxyName ?? ext.name,
      includeGlobalProxy: ext.includeGlobalProxy ?? false,
      useDummyProxy: ext.useDummyProxy ?? false,
      dontProcess: ext.dontProcess ?? false,
    })),
    types: user.types.map(mergeTypeConfig),
  };
}

/**
 * Build the classifier lookup tables.
 *
 * The wrapped table holds every configured type plus `wrappedTypes`.
 */
export function buildTypeTables(config: BindingConfig): TypeTables {
  return {
    primitives: new Set(config.primitives),
    wrapped: new Set([...config.types.map(t => t.type), ...config.wrappedTypes]),
  };
}
