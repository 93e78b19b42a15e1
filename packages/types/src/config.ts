/**
 * Binding configuration types
 *
 * The configuration names the types to wrap (in output order), the
 * interfaces each may expose, and the global tables used to decide how
 * arguments cross into the scripting language.
 */

/**
 * An interface (trait) whose implementation methods may be exposed
 */
export interface TraitConfig {
  /** Trait name as it appears in the type graph, e.g. "Add" */
  name: string;
  /** Full import path written as a `use` line, e.g. "std::ops::Add" */
  importPath: string;
}

/**
 * Per-type configuration
 */
export interface TypeConfig {
  /** Name of the struct or enum in the type graph */
  type: string;
  /**
   * Declaring crate/module name. When set, only items whose path starts
   * with it are matched.
   */
  source: string;
  /** Overrides the resolved import path when non-empty */
  importPath: string;
  /** Overrides the graph-sourced doc comment when set */
  doc?: string;
  /** Feature flags guarding the generated block */
  requiredFeatures: string[];
  /** Accepted interfaces; methods from other trait impls are never exposed */
  traits: TraitConfig[];
  /** Extra derive-flag text blocks, copied verbatim */
  deriveFlags: string[];
  /** Hand-written method signatures copied into the language impl block */
  extraMethods: string[];
}

/**
 * A wrapper type declared by hand outside the generated file
 */
export interface ExternalTypeConfig {
  /** Wrapper type name, e.g. "LuaWorld" */
  name: string;
  /** Global instance name, e.g. "world" */
  proxyName: string;
  /** Register a global instance for this type */
  includeGlobalProxy: boolean;
  /** Register the instance through a dummy type-name proxy */
  useDummyProxy: boolean;
  /** Leave the type out of documentation generation */
  dontProcess: boolean;
}

/**
 * Root prefix rewrite: crate `bevy_math` is imported as `bevy::math`
 */
export interface UmbrellaConfig {
  prefix: string;
  alias: string;
}

/**
 * Scripting languages the scaffolding can be written for
 */
export type ScriptLanguage = 'lua';

/**
 * Full binding configuration (after defaults are merged)
 */
export interface BindingConfig {
  /** Where the generated file is written (relative to the config file) */
  outputFile: string;
  /** Name used for the generated globals and provider types */
  apiName: string;
  /** Scripting language; also prefixes wrapper names ("Lua" + type) */
  language: ScriptLanguage;
  /** Macro invoked once per wrapped type */
  macroName: string;
  /** Feature flags guarding the global scaffolding */
  requiredFeatures: string[];
  umbrella: UmbrellaConfig;
  /** Free text copied after the file header */
  imports: string;
  /** Free text copied after the per-type blocks */
  other: string;
  /** Free text copied into the provider implementation */
  apiDefaults: string;
  /** Types passed to the script as-is */
  primitives: string[];
  /** Wrapped types besides the configured ones */
  wrappedTypes: string[];
  externalTypes: ExternalTypeConfig[];
  /** Types to wrap, in output order */
  types: TypeConfig[];
}

/**
 * Lookup tables derived from a BindingConfig, shared by the classifier
 */
export interface TypeTables {
  primitives: ReadonlySet<string>;
  wrapped: ReadonlySet<string>;
}
