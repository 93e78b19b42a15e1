/**
 * Tests for CLI error formatting
 */

import { describe, it, afterEach, mock } from 'node:test';
import assert from 'node:assert';
import { ConfigError, GraphError, UnmatchedTypesError } from '@scriptwrap/core';
import {
  errorNextSteps,
  exitWithCommandError,
  formatErrorLines,
} from '../src/utils/errorFormatter.js';

class ExitCalled extends Error {
  readonly exitCode: unknown;

  constructor(exitCode: unknown) {
    super('process.exit');
    this.exitCode = exitCode;
  }
}

describe('errorFormatter', () => {
  describe('formatErrorLines', () => {
    it('should print only the title without next steps', () => {
      assert.deepStrictEqual(formatErrorLines('Binding config not found'), ['✗ Binding config not found']);
    });

    it('should print next steps after a blank line', () => {
      assert.deepStrictEqual(formatErrorLines('Type graph is not valid JSON', ['Regenerate it', 'Code: ERR_GRAPH_INVALID']), [
        '✗ Type graph is not valid JSON',
        '',
        '→ Regenerate it',
        '→ Code: ERR_GRAPH_INVALID',
      ]);
    });
  });

  describe('errorNextSteps', () => {
    it('should list suggestion, file and code', () => {
      const error = new ConfigError('Types configured more than once: Vec3', 'ERR_CONFIG_DUPLICATE_TYPE', { filePath: 'bindings.yaml' }, 'Merge the duplicate entries into one');

      assert.deepStrictEqual(errorNextSteps(error), [
        'Merge the duplicate entries into one',
        'File: bindings.yaml',
        'Code: ERR_CONFIG_DUPLICATE_TYPE',
      ]);
    });

    it('should list only the code when nothing else is known', () => {
      assert.deepStrictEqual(errorNextSteps(new GraphError('broken', 'ERR_GRAPH_INVALID')), ['Code: ERR_GRAPH_INVALID']);
    });
  });

  describe('exitWithCommandError', () => {
    afterEach(() => {
      mock.restoreAll();
    });

    function runExit(error: unknown): { lines: string[]; exitCode: unknown } {
      const lines: string[] = [];
      mock.method(console, 'error', (line: unknown) => {
        lines.push(String(line));
      });
      mock.method(process, 'exit', (code?: unknown) => {
        throw new ExitCalled(code);
      });

      try {
        exitWithCommandError(error);
      } catch (err) {
        if (err instanceof ExitCalled) {
          return { lines, exitCode: err.exitCode };
        }
        throw err;
      }
    }

    it('should print a ScriptwrapError with its next steps and exit 1', () => {
      const { lines, exitCode } = runExit(new UnmatchedTypesError(['Quat']));

      assert.strictEqual(exitCode, 1);
      assert.deepStrictEqual(lines, [
        '✗ Some configured types could not be matched in the given type graphs (not found: Quat)',
        '',
        '→ Check the type names and `source` fields in the binding config, or pass the missing graph files',
        '→ Code: ERR_UNMATCHED_TYPES',
      ]);
    });

    it('should report other errors as unexpected', () => {
      const { lines } = runExit(new TypeError('boom'));

      assert.deepStrictEqual(lines, [
        '✗ Unexpected error: boom',
        '',
        '→ Re-run with --log-level debug for details',
      ]);
    });
  });
});
