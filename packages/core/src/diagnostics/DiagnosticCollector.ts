/**
 * DiagnosticCollector - Collects recoverable outcomes of a generation run
 *
 * Nothing recorded here stops a run. Excluded methods, fields that fell
 * back to the reflected placeholder and dropped operator implementations are
 * collected so the CLI can summarize them and write a diagnostics log.
 *
 * Usage:
 *   const collector = new DiagnosticCollector();
 *   generateBindings(graphs, config, { diagnostics: collector });
 *
 *   console.log(collector.summary());
 *   writeFileSync('diagnostics.log', collector.toDiagnosticsLog());
 */

/**
 * Diagnostic codes produced by the generator
 */
export type DiagnosticCode =
  | 'METHOD_EXCLUDED'
  | 'FIELD_REFLECTED'
  | 'OPERATOR_DROPPED'
  | 'GRAPH_FORMAT_UNTESTED';

/**
 * Diagnostic entry
 */
export interface Diagnostic {
  code: DiagnosticCode;
  severity: 'warning' | 'info';
  message: string;
  /** Wrapped type the diagnostic belongs to */
  typeName?: string;
  /** Method, field or operator name */
  member?: string;
  /** Every reason collected for an exclusion */
  reasons?: string[];
}

export class DiagnosticCollector {
  private readonly diagnostics: Diagnostic[] = [];

  add(diagnostic: Diagnostic): void {
    this.diagnostics.push(diagnostic);
  }

  getByCode(code: DiagnosticCode): Diagnostic[] {
    return this.diagnostics.filter(d => d.code === code);
  }

  count(): number {
    return this.diagnostics.length;
  }

  /**
   * Count per code, in first-seen order.
   */
  countByCode(): Map<DiagnosticCode, number> {
    const counts = new Map<DiagnosticCode, number>();
    for (const d of this.diagnostics) {
      counts.set(d.code, (counts.get(d.code) ?? 0) + 1);
    }
    return counts;
  }

  /**
   * One-line summary, e.g. "3 methods excluded, 1 field reflected".
   */
  summary(): string {
    const counts = this.countByCode();
    if (counts.size === 0) {
      return 'no diagnostics';
    }
    const labels: Record<DiagnosticCode, [string, string]> = {
      METHOD_EXCLUDED: ['method excluded', 'methods excluded'],
      FIELD_REFLECTED: ['field reflected', 'fields reflected'],
      OPERATOR_DROPPED: ['operator dropped', 'operators dropped'],
      GRAPH_FORMAT_UNTESTED: ['untested graph format', 'untested graph formats'],
    };
    return [...counts.entries()]
      .map(([code, n]) => `${n} ${labels[code][n === 1 ? 0 : 1]}`)
      .join(', ');
  }

  /**
   * JSON lines, one diagnostic per line.
   */
  toDiagnosticsLog(): string {
    return this.diagnostics.map(d => JSON.stringify(d)).join('\n');
  }
}
