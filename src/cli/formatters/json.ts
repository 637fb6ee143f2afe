import type { CompositionResult } from '../../core/composition/types.js';
import type { InheritanceChain } from '../../core/inheritance/types.js';
import type { HierarchySummary } from '../../core/orchestrator.js';
import type { ValidationReport } from '../../core/validation/types.js';
import type { IFormatter } from './types.js';

/**
 * JSON output formatter for machine consumption.
 */
export class JsonFormatter implements IFormatter {
  formatReport(report: ValidationReport): string {
    return JSON.stringify(report, null, 2);
  }

  formatSummary(summary: HierarchySummary, rulesRoot: string): string {
    return JSON.stringify({ root: rulesRoot, ...summary }, null, 2);
  }

  formatChain(rulePath: string, chain: InheritanceChain): string {
    return JSON.stringify({ rule: rulePath, chain }, null, 2);
  }

  formatDiagnostics(result: CompositionResult): string {
    return JSON.stringify({ conflicts: result.conflicts, warnings: result.warnings }, null, 2);
  }
}
