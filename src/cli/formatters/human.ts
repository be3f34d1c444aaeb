import * as path from 'node:path';
import chalk from 'chalk';
import type { DiscoveryResult } from '../../core/discovery/types.js';
import type { SyncOutcome, SyncSummary } from '../../core/manifest/types.js';
import type { ClientEntryCheck, StructureReport, StructureStatus } from '../../core/structure/types.js';
import type { IFormatter, FormatOptions } from './types.js';

type Color = 'red' | 'green' | 'yellow' | 'blue' | 'cyan' | 'dim';

/**
 * Human-readable output formatter.
 */
export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      colors: options.colors ?? true,
      verbose: options.verbose ?? false,
      root: options.root,
    };
  }

  formatDiscovery(result: DiscoveryResult): string {
    const lines: string[] = [];

    if (result.modules.length === 0) {
      lines.push(this.colorize(`No modules found in ${this.display(result.schemaRoot)}`, 'yellow'));
    } else {
      lines.push(`Modules in ${this.display(result.schemaRoot)} (${result.modules.length}):`);
      for (const moduleId of result.modules) {
        lines.push(`  ${moduleId}`);
      }
    }

    if (this.options.verbose && result.skipped.length > 0) {
      lines.push('');
      lines.push(this.colorize('Skipped:', 'dim'));
      for (const entry of result.skipped) {
        lines.push(this.colorize(`  ${entry.name} (${entry.reason})`, 'dim'));
      }
    }

    return lines.join('\n');
  }

  formatSync(summary: SyncSummary): string {
    const lines: string[] = [];
    lines.push(`Modules (${summary.modules.length}): ${summary.modules.join(', ')}`);
    lines.push('');

    for (const outcome of summary.outcomes) {
      lines.push(...this.formatOutcome(outcome, summary.dryRun));
    }

    const changed = summary.outcomes.filter((o) => o.status === 'changed').length;
    const unchanged = summary.outcomes.filter((o) => o.status === 'unchanged').length;
    const failed = summary.outcomes.filter((o) => o.status === 'error').length;

    lines.push('');
    lines.push(
      `SUMMARY: ${this.colorize(`${changed} ${summary.dryRun ? 'out of date' : 'updated'}`, changed > 0 ? 'yellow' : 'green')}, ` +
        `${unchanged} unchanged, ${this.colorize(`${failed} failed`, failed > 0 ? 'red' : 'green')}`
    );

    return lines.join('\n');
  }

  formatStructure(report: StructureReport): string {
    const lines: string[] = [];
    lines.push(`Modules (${report.modules.length}): ${report.modules.join(', ')}`);
    lines.push('');

    if (this.options.verbose) {
      for (const check of report.ok) {
        lines.push(`${this.colorize('✓', 'green')} ${check.ecosystem}: ${check.module} (${this.display(check.clientDir)})`);
      }
    }
    for (const check of report.missing) {
      lines.push(`${this.colorize('✗', 'red')} ${check.ecosystem}: ${check.module} ${this.describeMissing(check)} (${this.display(check.clientDir)})`);
    }
    for (const orphan of report.orphaned) {
      lines.push(`${this.colorize('⚠', 'yellow')} ${orphan.ecosystem}: ${orphan.name} has no schema module (${this.display(orphan.path)})`);
    }

    if (lines.length > 2) {
      lines.push('');
    }
    lines.push(
      `STATUS: ${this.statusLabel(report.status)} ` +
        `(${report.ok.length} ok, ${report.missing.length} missing, ${report.orphaned.length} orphaned)`
    );

    return lines.join('\n');
  }

  private formatOutcome(outcome: SyncOutcome, dryRun: boolean): string[] {
    const where = this.display(outcome.manifestPath);

    switch (outcome.status) {
      case 'unchanged':
        return [`${this.colorize('✓', 'green')} ${outcome.ecosystem}: unchanged (${where})`];
      case 'changed': {
        const label = dryRun ? 'out of date' : 'updated';
        return [
          `${this.colorize(dryRun ? '~' : '✓', dryRun ? 'yellow' : 'green')} ${outcome.ecosystem}: ${label} (${where})`,
          ...outcome.added.map((m) => this.colorize(`    + ${m}`, 'green')),
          ...outcome.removed.map((m) => this.colorize(`    - ${m}`, 'red')),
        ];
      }
      case 'error':
        return [
          `${this.colorize('✗', 'red')} ${outcome.ecosystem}: error (${where})`,
          `    ${outcome.error?.message ?? 'Unknown error'}`,
        ];
    }
  }

  private describeMissing(check: ClientEntryCheck): string {
    return check.reason === 'metadata' && check.metadataFile
      ? `missing ${check.metadataFile}`
      : 'missing client directory';
  }

  private statusLabel(status: StructureStatus): string {
    switch (status) {
      case 'pass':
        return this.colorize('PASS', 'green');
      case 'warn':
        return this.colorize('WARN', 'yellow');
      case 'fail':
        return this.colorize('FAIL', 'red');
    }
  }

  private display(filePath: string): string {
    return this.options.root ? path.relative(this.options.root, filePath) || '.' : filePath;
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'blue':
        return chalk.blue(text);
      case 'cyan':
        return chalk.cyan(text);
      case 'dim':
        return chalk.dim(text);
    }
  }
}
