/**
 * Shared plumbing for command actions: global options, project root,
 * configuration and log level.
 */
import * as path from 'node:path';
import type { Command } from 'commander';
import { loadConfig } from '../core/config/loader.js';
import type { Config } from '../core/config/schema.js';
import { ModSyncError, getErrorMessage } from '../utils/errors.js';
import { logger as log } from '../utils/logger.js';

/** Options accepted by the root program and visible to every command. */
export interface GlobalOptions {
  cwd?: string;
  config?: string;
  verbose?: boolean;
}

export interface CommandContext {
  projectRoot: string;
  config: Config;
}

/**
 * Global options as seen from a subcommand's action.
 */
export function globalOptions(command: Command): GlobalOptions {
  const { cwd, config, verbose } = command.optsWithGlobals<GlobalOptions>();
  return { cwd, config, verbose };
}

/**
 * `--verbose` turns on debug output; machine or quiet output keeps
 * only warnings and errors.
 */
export function applyLogLevel(globals: GlobalOptions, quiet = false): void {
  if (quiet) {
    log.setLevel('warn');
  } else if (globals.verbose) {
    log.setLevel('debug');
  } else {
    log.setLevel('info');
  }
}

export async function loadCommandContext(globals: GlobalOptions): Promise<CommandContext> {
  const projectRoot = path.resolve(globals.cwd ?? process.cwd());
  const config = await loadConfig(projectRoot, globals.config);
  log.debug(`Project root: ${projectRoot}`);
  return { projectRoot, config };
}

/**
 * Report a command failure. JSON mode keeps stdout parseable.
 */
export function reportFailure(error: unknown, json = false): void {
  if (json) {
    const payload = error instanceof ModSyncError
      ? error.toJSON()
      : { name: 'Error', message: getErrorMessage(error) };
    console.log(JSON.stringify({ error: payload }, null, 2));
    return;
  }
  log.error(error instanceof Error ? error.message : 'Unknown error');
}
