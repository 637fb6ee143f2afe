import chalk from 'chalk';
import type { CompositionResult, ConflictEntry } from '../../core/composition/types.js';
import { hasCycle } from '../../core/inheritance/resolver.js';
import type { InheritanceChain } from '../../core/inheritance/types.js';
import type { HierarchySummary } from '../../core/orchestrator.js';
import type { ValidationReport } from '../../core/validation/types.js';
import type { FormatOptions, IFormatter } from './types.js';

type Colour = 'red' | 'green' | 'yellow' | 'cyan' | 'dim' | 'bold';

/**
 * Human-readable output formatter.
 */
export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      colors: options.colors ?? true,
      verbose: options.verbose ?? false,
    };
  }

  formatReport(report: ValidationReport): string {
    const lines: string[] = [];
    const { statistics } = report;

    lines.push(
      report.valid
        ? `${this.colorize('✓', 'green')} ${this.colorize('VALID', 'green')}`
        : `${this.colorize('✗', 'red')} ${this.colorize('INVALID', 'red')}`
    );
    lines.push(
      `   Rules: ${statistics.totalRules}, with inheritance: ${statistics.rulesWithInheritance}, ` +
        `max depth: ${statistics.maxDepth}, conflicts: ${statistics.totalConflicts}`
    );

    const types = Object.entries(statistics.inheritanceTypes)
      .filter(([, count]) => count > 0)
      .map(([type, count]) => `${type}: ${count}`);
    if (types.length > 0) {
      lines.push(`   Inheritance types: ${types.join(', ')}`);
    }

    if (report.errors.length > 0) {
      lines.push('');
      lines.push(`   ${this.colorize(`ERRORS (${report.errors.length}):`, 'red')}`);
      for (const error of report.errors) {
        lines.push(`      ${error}`);
      }
    }

    if (report.warnings.length > 0) {
      lines.push('');
      lines.push(`   ${this.colorize(`WARNINGS (${report.warnings.length}):`, 'yellow')}`);
      for (const warning of report.warnings) {
        lines.push(`      ${warning}`);
      }
    }

    if (this.options.verbose) {
      const entries = Object.entries(report.conflicts);
      if (entries.length > 0) {
        lines.push('');
        lines.push(`   ${this.colorize('CONFLICTS:', 'cyan')}`);
        for (const [rulePath, conflicts] of entries) {
          lines.push(`      ${rulePath}`);
          for (const conflict of conflicts) {
            lines.push(`        ${this.formatConflict(conflict)}`);
          }
        }
      }
    }

    return lines.join('\n');
  }

  formatSummary(summary: HierarchySummary, rulesRoot: string): string {
    const lines: string[] = [];
    lines.push(this.colorize(`Rule hierarchy: ${rulesRoot}`, 'bold'));
    lines.push(this.colorize('─'.repeat(50), 'dim'));

    const types = Object.entries(summary.ruleTypes)
      .filter(([, count]) => count > 0)
      .map(([type, count]) => `${type}: ${count}`);
    lines.push(`Rules: ${summary.totalRules}${types.length > 0 ? ` (${types.join(', ')})` : ''}`);
    lines.push(`With inheritance: ${summary.rulesWithInheritance}`);
    lines.push(`Roots: ${summary.roots.length > 0 ? summary.roots.join(', ') : this.colorize('(none)', 'dim')}`);

    if (summary.rulesWithWarnings.length > 0) {
      lines.push(
        this.colorize(`Parse warnings in: ${summary.rulesWithWarnings.join(', ')}`, 'yellow')
      );
    }

    return lines.join('\n');
  }

  formatChain(rulePath: string, chain: InheritanceChain): string {
    const lines = chain.map((path, depth) => `${'  '.repeat(depth)}${depth === 0 ? '' : '└─ '}${path}`);
    if (hasCycle(chain)) {
      lines.push(this.colorize(`⚠ circular inheritance while resolving ${rulePath}`, 'yellow'));
    }
    return lines.join('\n');
  }

  formatDiagnostics(result: CompositionResult): string {
    const lines: string[] = [];
    for (const conflict of result.conflicts) {
      const colour: Colour = conflict.severity === 'error' ? 'red' : 'yellow';
      lines.push(this.colorize(this.formatConflict(conflict), colour));
    }
    for (const warning of result.warnings) {
      lines.push(this.colorize(`⚠ ${warning}`, 'yellow'));
    }
    return lines.join('\n');
  }

  private formatConflict(conflict: ConflictEntry): string {
    const link = conflict.parentPath ? `${conflict.parentPath} → ${conflict.childPath}` : conflict.childPath;
    return `${conflict.kind} ${conflict.sectionOrKey} (${link}): ${conflict.resolution}`;
  }

  private colorize(text: string, colour: Colour): string {
    if (!this.options.colors) {
      return text;
    }

    switch (colour) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'cyan':
        return chalk.cyan(text);
      case 'dim':
        return chalk.dim(text);
      case 'bold':
        return chalk.bold(text);
    }
  }
}
