/**
 * modsync: keeps multi-language workspace manifests in step with a schema module tree.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Module discovery
export * from './core/discovery/index.js';

// Manifest synchronization
export * from './core/manifest/index.js';

// Structure validation
export * from './core/structure/index.js';

// Scaffolding
export * from './core/scaffold/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
