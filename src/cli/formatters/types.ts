/**
 * Formatter type definitions.
 */
import type { DiscoveryResult } from '../../core/discovery/types.js';
import type { SyncSummary } from '../../core/manifest/types.js';
import type { StructureReport } from '../../core/structure/types.js';

/**
 * Output format options.
 */
export type OutputFormat = 'human' | 'json';

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  /** Use colors in output */
  colors: boolean;
  /** Verbose output */
  verbose: boolean;
  /** Paths are printed relative to this directory when set */
  root?: string;
}

/**
 * Interface for output formatters.
 */
export interface IFormatter {
  formatDiscovery(result: DiscoveryResult): string;
  formatSync(summary: SyncSummary): string;
  formatStructure(report: StructureReport): string;
}
