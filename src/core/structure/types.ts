/**
 * Structure validation type definitions.
 */
import type { DiscoveryOptions } from '../discovery/types.js';

/**
 * One ecosystem's client tree.
 */
export interface ClientRoot {
  ecosystem: string;
  /** Absolute directory holding one client package per module */
  root: string;
  /** File each client package must contain, or null for directory-only checks */
  metadataFile: string | null;
  /** Housekeeping directory names never reported as orphaned */
  ignore: readonly string[];
}

export type MissingReason = 'directory' | 'metadata';

/**
 * Expected client entry for one module in one ecosystem.
 */
export interface ClientEntryCheck {
  ecosystem: string;
  module: string;
  clientDir: string;
  metadataFile: string | null;
  status: 'ok' | 'missing';
  reason?: MissingReason;
}

/**
 * Client directory with no matching schema module.
 */
export interface OrphanedEntry {
  ecosystem: string;
  name: string;
  path: string;
}

/**
 * pass: nothing missing or orphaned; warn: only orphans; fail: something missing.
 */
export type StructureStatus = 'pass' | 'warn' | 'fail';

export interface StructureReport {
  schemaRoot: string;
  modules: string[];
  ok: ClientEntryCheck[];
  missing: ClientEntryCheck[];
  orphaned: OrphanedEntry[];
  status: StructureStatus;
}

export interface ValidateStructureOptions {
  discovery?: Partial<DiscoveryOptions>;
  /** Use this module set instead of discovering one */
  modules?: readonly string[];
}
