import { Command } from 'commander';
import { resolveSchemaRoot } from '../../core/config/loader.js';
import { discoveryOptionsFromConfig, scanSchemaRoot } from '../../core/discovery/index.js';
import { createFormatter } from '../formatters/index.js';
import { applyLogLevel, globalOptions, loadCommandContext, reportFailure, type GlobalOptions } from '../context.js';

/**
 * Create the discover command.
 */
export function createDiscoverCommand(): Command {
  return new Command('discover')
    .description('List the modules under the schema root')
    .option('--json', 'Output as JSON')
    .action(async (options: DiscoverOptions, command: Command) => {
      try {
        process.exitCode = await runDiscover(options, globalOptions(command));
      } catch (error) {
        reportFailure(error, options.json);
        process.exit(1);
      }
    });
}

export interface DiscoverOptions {
  json?: boolean;
}

export async function runDiscover(options: DiscoverOptions, globals: GlobalOptions): Promise<number> {
  applyLogLevel(globals, options.json);
  const { projectRoot, config } = await loadCommandContext(globals);

  const result = await scanSchemaRoot(resolveSchemaRoot(projectRoot, config), discoveryOptionsFromConfig(config));
  const formatter = createFormatter(options.json ? 'json' : 'human', {
    verbose: globals.verbose,
    root: projectRoot,
  });
  console.log(formatter.formatDiscovery(result));
  return 0;
}
