/**
 * Structure validation exports barrel file.
 */
export {
  validateStructure,
  clientRootsFromConfig,
  checkClientEntry,
  findOrphans,
  structureStatus,
} from './validator.js';
export type {
  ClientRoot,
  ClientEntryCheck,
  OrphanedEntry,
  MissingReason,
  StructureReport,
  StructureStatus,
  ValidateStructureOptions,
} from './types.js';
