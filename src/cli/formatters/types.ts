/**
 * Formatter type definitions.
 */
import type { CompositionResult } from '../../core/composition/types.js';
import type { InheritanceChain } from '../../core/inheritance/types.js';
import type { HierarchySummary } from '../../core/orchestrator.js';
import type { ValidationReport } from '../../core/validation/types.js';

export type OutputFormat = 'human' | 'json';

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  /** Use colors in output */
  colors: boolean;
  /** Verbose output */
  verbose: boolean;
}

/**
 * Interface for output formatters.
 */
export interface IFormatter {
  formatReport(report: ValidationReport): string;
  formatSummary(summary: HierarchySummary, rulesRoot: string): string;
  formatChain(rulePath: string, chain: InheritanceChain): string;
  /** Conflicts and warnings of a composition (the composed text is rendered separately) */
  formatDiagnostics(result: CompositionResult): string;
}
