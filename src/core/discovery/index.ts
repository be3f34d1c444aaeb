/**
 * Module discovery exports barrel file.
 */
export {
  discoverModules,
  scanSchemaRoot,
  isValidModuleId,
  MODULE_ID_PATTERN,
  DEFAULT_DISCOVERY_OPTIONS,
} from './discoverer.js';
export { discoveryOptionsFromConfig } from './options.js';
export type {
  ModuleSet,
  DiscoveryOptions,
  DiscoveryResult,
  SkippedEntry,
  SkipReason,
} from './types.js';
