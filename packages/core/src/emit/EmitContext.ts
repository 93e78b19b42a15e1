import type { BindingConfig, TypeTables } from '@scriptwrap/types';
import { buildTypeTables } from '../config/ConfigLoader.js';
import { DiagnosticCollector } from '../diagnostics/DiagnosticCollector.js';
import { silentLogger, type Logger } from '../logging/Logger.js';

/**
 * State of one generation run. Created per generateBindings call and
 * passed explicitly; nothing here outlives the run.
 */
export interface EmitContext {
  config: BindingConfig;
  tables: TypeTables;
  /** Render excluded methods as commented-out trails */
  printErrors: boolean;
  diagnostics: DiagnosticCollector;
  logger: Logger;
  /** Accepted interfaces in first-use order: name -> import path */
  importedTraits: Map<string, string>;
}

export interface EmitOptions {
  printErrors?: boolean;
  diagnostics?: DiagnosticCollector;
  logger?: Logger;
}

export function createEmitContext(config: BindingConfig, options: EmitOptions = {}): EmitContext {
  return {
    config,
    tables: buildTypeTables(config),
    printErrors: options.printErrors ?? false,
    diagnostics: options.diagnostics ?? new DiagnosticCollector(),
    logger: options.logger ?? silentLogger,
    importedTraits: new Map(),
  };
}
