/**
 * @scriptwrap/core - Binding descriptor generator
 */

// Error types
export {
  ScriptwrapError,
  ConfigError,
  FileAccessError,
  GraphError,
  UnmatchedTypesError,
} from './errors/ScriptwrapError.js';
export type { ErrorContext, ScriptwrapErrorJSON } from './errors/ScriptwrapError.js';

// Logging
export {
  ConsoleLogger,
  FileLogger,
  MultiLogger,
  createLogger,
  closeLogger,
  silentLogger,
  isLogLevel,
  LOG_LEVELS,
} from './logging/Logger.js';
export type { Logger, LogLevel } from './logging/Logger.js';

// Diagnostics
export { DiagnosticCollector, DiagnosticWriter } from './diagnostics/index.js';
export type { Diagnostic, DiagnosticCode } from './diagnostics/index.js';

// Config
export {
  loadBindingConfig,
  parseBindingConfig,
  validateUniqueTypes,
  buildTypeTables,
  DEFAULT_CONFIG,
  BINDING_CONFIG_SCHEMA,
} from './config/index.js';
export type { LoadedConfig, RawBindingConfig, RawTypeConfig } from './config/index.js';

// Type graph
export {
  TypeGraph,
  loadTypeGraph,
  loadTypeGraphs,
  parseTypeGraph,
  idKey,
  itemKind,
  pathRefName,
} from './graph/index.js';
export type { ItemKind } from './graph/index.js';

// Generator components
export {
  classifyType,
  wrapperFor,
  renderArg,
  formatArgType,
  baseIdent,
  isSelf,
} from './bindings/ArgType.js';
export type { ArgType, ArgWrapperType, Classification } from './bindings/ArgType.js';
export { resolvePath, toImportPath, formatUseStatement } from './bindings/PathResolver.js';
export { collectMembers } from './bindings/MemberCollector.js';
export type { ImplMember, MemberSet, WrappedItem } from './bindings/MemberCollector.js';
export { selectMethods } from './bindings/MethodSelector.js';
export type { MethodSelection } from './bindings/MethodSelector.js';
export { selectFields, REFLECTED_VALUE } from './bindings/FieldSelector.js';
export { mapBinaryOperators, mapUnaryOperators, BINARY_OPERATORS, UNARY_OPERATORS } from './bindings/OperatorMapper.js';

// Emitter
export { DescriptorWriter, splitLines, docLines } from './emit/DescriptorWriter.js';
export { createEmitContext } from './emit/EmitContext.js';
export type { EmitContext, EmitOptions } from './emit/EmitContext.js';
export { emitBinding, featureGuard, deriveFlagLines, fullPath } from './emit/BindingEmitter.js';
export { emitScaffolding, globalInstances, wrapperPrefix } from './emit/Scaffolding.js';

// Entry point
export { generateBindings, matchTypes, FILE_HEADER } from './Generator.js';
export type { GenerateOptions } from './Generator.js';

// Version
export {
  SCRIPTWRAP_VERSION,
  MIN_GRAPH_FORMAT_VERSION,
  MAX_GRAPH_FORMAT_VERSION,
  isTestedGraphFormat,
} from './version.js';
