/**
 * DiagnosticCollector Tests
 *
 * - add, filter by code, counts
 * - one-line summary with singular and plural labels
 * - JSON lines log
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';

import { DiagnosticCollector, type Diagnostic } from '@scriptwrap/core';

// =============================================================================
// Test Helpers
// =============================================================================

function excluded(typeName: string, member: string): Diagnostic {
  return {
    code: 'METHOD_EXCLUDED',
    severity: 'warning',
    message: `${typeName}::${member} excluded: Generics on the method`,
    typeName,
    member,
    reasons: ['Generics on the method'],
  };
}

function reflected(typeName: string, member: string): Diagnostic {
  return {
    code: 'FIELD_REFLECTED',
    severity: 'info',
    message: `${typeName}.${member} exposed as Raw(ReflectedValue)`,
    typeName,
    member,
  };
}

// =============================================================================
// TESTS: DiagnosticCollector
// =============================================================================

describe('DiagnosticCollector', () => {
  let collector: DiagnosticCollector;

  beforeEach(() => {
    collector = new DiagnosticCollector();
  });

  describe('collecting', () => {
    it('should start empty', () => {
      assert.strictEqual(collector.count(), 0);
      assert.deepStrictEqual(collector.getByCode('METHOD_EXCLUDED'), []);
    });

    it('should count every added diagnostic', () => {
      collector.add(excluded('Vec3', 'lerp'));
      collector.add(reflected('Transform', 'mesh'));

      assert.strictEqual(collector.count(), 2);
    });

    it('should filter by code', () => {
      collector.add(excluded('Vec3', 'lerp'));
      collector.add(reflected('Transform', 'mesh'));
      collector.add(excluded('Quat', 'slerp'));

      assert.deepStrictEqual(collector.getByCode('METHOD_EXCLUDED').map(d => d.member), ['lerp', 'slerp']);
    });
  });

  describe('summary', () => {
    it('should say so when nothing was collected', () => {
      assert.strictEqual(collector.summary(), 'no diagnostics');
    });

    it('should count per code in first-seen order', () => {
      collector.add(reflected('Transform', 'mesh'));
      collector.add(excluded('Vec3', 'lerp'));
      collector.add(excluded('Quat', 'slerp'));

      assert.deepStrictEqual([...collector.countByCode()], [['FIELD_REFLECTED', 1], ['METHOD_EXCLUDED', 2]]);
      assert.strictEqual(collector.summary(), '1 field reflected, 2 methods excluded');
    });
  });

  describe('toDiagnosticsLog', () => {
    it('should write one JSON object per line', () => {
      collector.add(excluded('Vec3', 'lerp'));
      collector.add(reflected('Transform', 'mesh'));

      const lines = collector.toDiagnosticsLog().split('\n');

      assert.strictEqual(lines.length, 2);
      assert.deepStrictEqual(lines.map(line => JSON.parse(line)), [excluded('Vec3', 'lerp'), reflected('Transform', 'mesh')]);
    });

    it('should be empty without diagnostics', () => {
      assert.strictEqual(collector.toDiagnosticsLog(), '');
    });
  });
});
