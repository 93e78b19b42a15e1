/**
 * Generate command - write the binding descriptor file
 *
 * Reads one or more rustdoc JSON files and a binding config, then writes
 * the generated descriptors to the config's `outputFile` (resolved against
 * the config file's directory) or to --output.
 */

import { Command } from 'commander';
import { mkdirSync, writeFileSync } from 'fs';
import { dirname, relative, resolve } from 'path';
import {
  closeLogger,
  createLogger,
  DiagnosticCollector,
  DiagnosticWriter,
  FileAccessError,
  generateBindings,
  isLogLevel,
  loadBindingConfig,
  loadTypeGraphs,
  type Logger,
  type LogLevel,
} from '@scriptwrap/core';
import { exitWithCommandError } from '../utils/errorFormatter.js';

export interface GenerateCommandOptions {
  config: string;
  output?: string;
  printErrors?: boolean;
  diagnosticsLog?: string;
  quiet?: boolean;
  verbose?: boolean;
  logLevel?: string;
  logFile?: string;
}

export interface GenerateReport {
  outputPath: string;
  diagnostics: DiagnosticCollector;
  diagnosticsLogPath?: string;
}

/**
 * Determine log level from CLI options.
 * Priority: --log-level > --quiet > --verbose > default ('warnings')
 */
export function getLogLevel(options: Pick<GenerateCommandOptions, 'quiet' | 'verbose' | 'logLevel'>): LogLevel {
  if (options.logLevel && isLogLevel(options.logLevel)) {
    return options.logLevel;
  }
  if (options.quiet) return 'silent';
  if (options.verbose) return 'info';
  return 'warnings';
}

/**
 * Write the generated text, creating parent directories.
 *
 * @throws FileAccessError when the file cannot be written
 */
export function writeOutput(outputPath: string, content: string): void {
  try {
    mkdirSync(dirname(outputPath), { recursive: true });
    writeFileSync(outputPath, content, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new FileAccessError(
      `Cannot write output file: ${message}`,
      'ERR_FILE_UNWRITABLE',
      { filePath: outputPath },
      'Check that the output directory is writable, or pass --output'
    );
  }
}

/**
 * The whole command without process handling; throws on fatal errors.
 */
export function runGenerate(graphPaths: string[], options: GenerateCommandOptions, logger: Logger): GenerateReport {
  const { config, baseDir } = loadBindingConfig(options.config);
  logger.debug('Loaded binding config', { types: config.types.length });

  const graphs = loadTypeGraphs(graphPaths, logger);
  const diagnostics = new DiagnosticCollector();
  const content = generateBindings(graphs, config, {
    printErrors: options.printErrors ?? false,
    diagnostics,
    logger,
  });

  const outputPath = options.output ? resolve(options.output) : resolve(baseDir, config.outputFile);
  writeOutput(outputPath, content);
  logger.info('Wrote binding descriptors', { file: outputPath, diagnostics: diagnostics.count() });

  const report: GenerateReport = { outputPath, diagnostics };
  if (options.diagnosticsLog) {
    report.diagnosticsLogPath = new DiagnosticWriter().write(diagnostics, options.diagnosticsLog);
  }
  return report;
}

/**
 * Lines printed after a successful run. Paths are shown relative to `cwd`.
 */
export function reportLines(report: GenerateReport, options: Pick<GenerateCommandOptions, 'printErrors'>, cwd: string): string[] {
  const lines = [
    `Wrote ${relative(cwd, report.outputPath)}`,
    `Diagnostics: ${report.diagnostics.summary()}`,
  ];
  if (report.diagnosticsLogPath) {
    lines.push(`Diagnostics log: ${relative(cwd, report.diagnosticsLogPath)}`);
  }
  if (!options.printErrors && report.diagnostics.getByCode('METHOD_EXCLUDED').length > 0) {
    lines.push('Re-run with --print-errors to see why methods were excluded');
  }
  return lines;
}

export const generateCommand = new Command('generate')
  .description('Generate binding descriptors for the configured types')
  .argument('<graphs...>', 'rustdoc JSON files (read as one type graph)')
  .requiredOption('-c, --config <path>', 'Binding config (.yaml, .yml or .json)')
  .option('-o, --output <path>', 'Output file (overrides outputFile from the config)')
  .option('--print-errors', 'Write excluded methods as commented-out trails')
  .option('--diagnostics-log <path>', 'Write every diagnostic as JSON lines')
  .option('-q, --quiet', 'Suppress output')
  .option('-v, --verbose', 'Show verbose logging')
  .option('--log-level <level>', 'Set log level (silent, errors, warnings, info, debug)')
  .option('--log-file <path>', 'Write all log output to a file')
  .addHelpText('after', `
Examples:
  scriptwrap generate bevy_math.json -c bindings.yaml
  scriptwrap generate bevy_math.json bevy_transform.json -c bindings.yaml -o src/generated.rs
  scriptwrap generate bevy_math.json -c bindings.yaml --print-errors --diagnostics-log diag.log
`)
  .action(async (graphs: string[], options: GenerateCommandOptions) => {
    const logFile = options.logFile ? resolve(options.logFile) : undefined;
    const logger = createLogger(getLogLevel(options), logFile ? { logFile } : undefined);

    let report: GenerateReport;
    try {
      report = runGenerate(graphs, options, logger);
    } catch (err) {
      await closeLogger(logger);
      exitWithCommandError(err);
    }
    await closeLogger(logger);

    if (!options.quiet) {
      for (const line of reportLines(report, options, process.cwd())) {
        console.log(line);
      }
    }
  });
