/**
 * DiagnosticWriter - Writes a run's diagnostics to a JSON lines file
 *
 * JSON lines keep the log greppable and easy to feed to jq.
 *
 * Usage:
 *   new DiagnosticWriter().write(collector, 'out/diagnostics.log');
 */

import { writeFileSync, mkdirSync } from 'fs';
import { dirname, resolve } from 'path';

import type { DiagnosticCollector } from './DiagnosticCollector.js';
import { FileAccessError } from '../errors/ScriptwrapError.js';

export class DiagnosticWriter {
  /**
   * Write all diagnostics to `logPath`, creating parent directories and
   * overwriting an existing file. Returns the absolute path written.
   */
  write(collector: DiagnosticCollector, logPath: string): string {
    const absolutePath = resolve(logPath);
    const content = collector.toDiagnosticsLog();

    try {
      mkdirSync(dirname(absolutePath), { recursive: true });
      writeFileSync(absolutePath, content.length > 0 ? `${content}\n` : '', 'utf-8');
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new FileAccessError(
        `Cannot write diagnostics log: ${message}`,
        'ERR_FILE_UNWRITABLE',
        { filePath: absolutePath }
      );
    }

    return absolutePath;
  }
}
