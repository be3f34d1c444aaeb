import type { DiscoveryResult } from '../../core/discovery/types.js';
import type { SyncOutcome, SyncSummary } from '../../core/manifest/types.js';
import type { ClientEntryCheck, StructureReport } from '../../core/structure/types.js';
import type { IFormatter } from './types.js';

/**
 * JSON output formatter for machine consumption.
 */
export class JsonFormatter implements IFormatter {
  formatDiscovery(result: DiscoveryResult): string {
    return JSON.stringify(
      {
        schema_root: result.schemaRoot,
        modules: result.modules,
        skipped: result.skipped,
      },
      null,
      2
    );
  }

  formatSync(summary: SyncSummary): string {
    return JSON.stringify(this.transformSync(summary), null, 2);
  }

  transformSync(summary: SyncSummary): Record<string, unknown> {
    return {
      modules: summary.modules,
      dry_run: summary.dryRun,
      changed: summary.changed,
      has_errors: summary.hasErrors,
      outcomes: summary.outcomes.map((o) => this.transformOutcome(o)),
    };
  }

  formatStructure(report: StructureReport): string {
    return JSON.stringify(
      {
        status: report.status,
        schema_root: report.schemaRoot,
        modules: report.modules,
        ok: report.ok.map((c) => this.transformCheck(c)),
        missing: report.missing.map((c) => this.transformCheck(c)),
        orphaned: report.orphaned,
      },
      null,
      2
    );
  }

  private transformOutcome(outcome: SyncOutcome): Record<string, unknown> {
    return {
      ecosystem: outcome.ecosystem,
      manifest: outcome.manifestPath,
      status: outcome.status,
      members: outcome.members,
      added: outcome.added,
      removed: outcome.removed,
      written: outcome.written,
      error: outcome.error ? outcome.error.toJSON() : null,
    };
  }

  private transformCheck(check: ClientEntryCheck): Record<string, unknown> {
    return {
      ecosystem: check.ecosystem,
      module: check.module,
      path: check.clientDir,
      metadata_file: check.metadataFile,
      ...(check.reason ? { reason: check.reason } : {}),
    };
  }
}
