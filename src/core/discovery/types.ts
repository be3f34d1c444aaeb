/**
 * Module discovery type definitions.
 */

/** Ordered, deduplicated module ids. Recomputed on every run. */
export type ModuleSet = readonly string[];

export interface DiscoveryOptions {
  /** Entries starting with this prefix are hidden (empty string disables) */
  hiddenPrefix: string;
  /** Infrastructure directory names that are not modules */
  exclude: readonly string[];
  /** Sort lexicographically instead of keeping filesystem order */
  sort: boolean;
}

export type SkipReason = 'hidden' | 'excluded' | 'invalid';

export interface SkippedEntry {
  name: string;
  reason: SkipReason;
}

export interface DiscoveryResult {
  schemaRoot: string;
  modules: string[];
  skipped: SkippedEntry[];
}
