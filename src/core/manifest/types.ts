/**
 * Manifest synchronization type definitions.
 */
import type { ModSyncError } from '../../utils/errors.js';
import type { ManifestFormat } from '../config/schema.js';

/**
 * The members section of a manifest as located by an adapter.
 */
export interface MembersSection {
  /** Entries currently declared, in file order */
  entries: string[];
}

/**
 * Members section of a text-edited manifest, with its character span.
 */
export interface TextMembersSection extends MembersSection {
  /** Offset of the first character of the section */
  start: number;
  /** Offset just past the last character of the section */
  end: number;
  /** Leading whitespace of the line the section starts on */
  indent: string;
}

/**
 * A manifest kept as raw text alongside its parsed form.
 * Text adapters splice the members section back into `source`.
 */
export interface TextManifest<TTree = unknown> {
  filePath: string;
  source: string;
  tree: TTree;
}

/**
 * Capability set every ecosystem format implements.
 * The synchronizer is written once against this interface.
 */
export interface ManifestAdapter<TDocument, TSection extends MembersSection = MembersSection> {
  readonly format: ManifestFormat;

  /** Parse manifest text into its native structured form. Throws ManifestParseError. */
  parse(content: string, filePath: string): TDocument;

  /** Find the members section. Throws ManifestParseError when absent. */
  locateMembersSection(document: TDocument): TSection;

  /** Return a document whose members section holds exactly `members`. */
  replaceMembersSection(document: TDocument, section: TSection, members: readonly string[]): TDocument;

  /** Produce the manifest text to write back. */
  serialize(document: TDocument): string;
}

export type SyncStatus = 'changed' | 'unchanged' | 'error';

/**
 * Result of synchronizing one ecosystem's manifest.
 */
export interface SyncOutcome {
  ecosystem: string;
  manifestPath: string;
  status: SyncStatus;
  /** Desired member entries */
  members: string[];
  /** Entries present after sync but not before */
  added: string[];
  /** Entries present before sync but not after */
  removed: string[];
  /** Whether the file was actually written */
  written: boolean;
  error?: ModSyncError;
}

/**
 * Result of synchronizing every enabled ecosystem.
 */
export interface SyncSummary {
  modules: string[];
  outcomes: SyncOutcome[];
  /** At least one manifest changed (or would change in dry-run mode) */
  changed: boolean;
  hasErrors: boolean;
  dryRun: boolean;
}

export interface SyncManifestOptions {
  /** Compute the outcome without writing */
  dryRun?: boolean;
}

export interface SyncWorkspacesOptions extends SyncManifestOptions {
  /** Use this module set instead of discovering one */
  modules?: readonly string[];
  /** Allow writing empty member lists when no modules exist */
  allowEmpty?: boolean;
}
