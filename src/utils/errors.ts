/**
 * Error types and codes for modsync.
 * This is the error contract - all errors should extend ModSyncError.
 */

/**
 * Base error class for all modsync errors.
 */
export class ModSyncError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ModSyncError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends ModSyncError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Invalid scaffold input. Raised before anything touches the filesystem.
 */
export class ValidationError extends ModSyncError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ValidationError';
  }
}

/**
 * Missing template set or malformed template files.
 */
export class TemplateError extends ModSyncError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'TemplateError';
  }
}

/**
 * Manifest could not be read, parsed, or its members section located.
 * Scoped to a single ecosystem.
 */
export class ManifestParseError extends ModSyncError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ManifestParseError';
  }
}

/**
 * Manifest could not be written back. The original file is left untouched.
 */
export class ManifestWriteError extends ModSyncError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ManifestWriteError';
  }
}

/**
 * Client tree is missing expected module directories or metadata files.
 */
export class StructureError extends ModSyncError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'StructureError';
  }
}

/**
 * Module discovery produced nothing usable.
 */
export class DiscoveryError extends ModSyncError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'DiscoveryError';
  }
}

/**
 * Security errors (path traversal outside the module directory).
 */
export class SecurityError extends ModSyncError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SecurityError';
  }
}

export const ErrorCodes = {
  // Scaffold input
  EMPTY_NAME: 'EMPTY_NAME',
  INVALID_NAME: 'INVALID_NAME',
  MODULE_EXISTS: 'MODULE_EXISTS',
  RESERVED_NAME: 'RESERVED_NAME',
  INVALID_VERSION: 'INVALID_VERSION',
  INVALID_ENTITY: 'INVALID_ENTITY',

  // Templates
  TEMPLATE_NOT_FOUND: 'TEMPLATE_NOT_FOUND',
  TEMPLATE_INVALID: 'TEMPLATE_INVALID',
  SCAFFOLD_WRITE_ERROR: 'SCAFFOLD_WRITE_ERROR',

  // Manifests
  MANIFEST_NOT_FOUND: 'MANIFEST_NOT_FOUND',
  MANIFEST_PARSE_ERROR: 'MANIFEST_PARSE_ERROR',
  SECTION_NOT_FOUND: 'SECTION_NOT_FOUND',
  MANIFEST_WRITE_ERROR: 'MANIFEST_WRITE_ERROR',

  // Structure
  MISSING_CLIENTS: 'MISSING_CLIENTS',
  ORPHANED_CLIENTS: 'ORPHANED_CLIENTS',

  // Discovery
  NO_MODULES: 'NO_MODULES',

  // Configuration and parsing
  CONFIG_LOAD_ERROR: 'CONFIG_LOAD_ERROR',
  PARSE_ERROR: 'PARSE_ERROR',
  INVALID_CONFIG: 'INVALID_CONFIG',

  // Security
  PATH_TRAVERSAL: 'PATH_TRAVERSAL',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Extract a printable message from anything thrown.
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
