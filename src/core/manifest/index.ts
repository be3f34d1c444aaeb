/**
 * Manifest synchronization exports barrel file.
 */
export {
  syncManifest,
  syncEcosystem,
  syncWorkspaces,
  computeDesiredMembers,
  renderMember,
} from './synchronizer.js';
export * from './adapters/index.js';
export type {
  ManifestAdapter,
  MembersSection,
  TextMembersSection,
  TextManifest,
  SyncStatus,
  SyncOutcome,
  SyncSummary,
  SyncManifestOptions,
  SyncWorkspacesOptions,
} from './types.js';
