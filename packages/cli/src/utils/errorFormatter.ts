/**
 * Standardized error formatting for CLI commands
 *
 * Format:
 *   ✗ Main error message (1 line, concise)
 *
 *   → Next action 1
 *   → Next action 2
 */

import { ScriptwrapError } from '@scriptwrap/core';

/**
 * Lines printed for an error, without the exit.
 */
export function formatErrorLines(title: string, nextSteps?: string[]): string[] {
  const lines = [`✗ ${title}`];
  if (nextSteps && nextSteps.length > 0) {
    lines.push('');
    for (const step of nextSteps) {
      lines.push(`→ ${step}`);
    }
  }
  return lines;
}

/**
 * Print a standardized error message and exit.
 *
 * @param title - Main error message (should be under 80 chars)
 * @param nextSteps - Optional array of actionable suggestions
 * @returns never - always calls process.exit(1)
 *
 * @example
 * exitWithError('Binding config not found', [
 *   'Pass the config path with --config'
 * ]);
 */
export function exitWithError(title: string, nextSteps?: string[]): never {
  for (const line of formatErrorLines(title, nextSteps)) {
    console.error(line);
  }
  process.exit(1);
}

/**
 * Next steps for a ScriptwrapError: its suggestion, then the file involved.
 */
export function errorNextSteps(error: ScriptwrapError): string[] {
  const steps: string[] = [];
  if (error.suggestion) {
    steps.push(error.suggestion);
  }
  if (error.context.filePath) {
    steps.push(`File: ${error.context.filePath}`);
  }
  steps.push(`Code: ${error.code}`);
  return steps;
}

/**
 * Report a command failure and exit. Errors that are not ScriptwrapErrors
 * are reported as unexpected.
 */
export function exitWithCommandError(error: unknown): never {
  if (error instanceof ScriptwrapError) {
    exitWithError(error.message, errorNextSteps(error));
  }
  const message = error instanceof Error ? error.message : String(error);
  exitWithError(`Unexpected error: ${message}`, ['Re-run with --log-level debug for details']);
}
