/**
 * Binding configuration loading
 */
export {
  loadBindingConfig,
  parseBindingConfig,
  validateUniqueTypes,
  buildTypeTables,
  DEFAULT_CONFIG,
} from './ConfigLoader.js';
export type { LoadedConfig } from './ConfigLoader.js';
export { BINDING_CONFIG_SCHEMA } from './schema.js';
export type { RawBindingConfig, RawTypeConfig } from './schema.js';
