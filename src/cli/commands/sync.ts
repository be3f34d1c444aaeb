import { Command } from 'commander';
import chalk from 'chalk';
import { syncWorkspaces } from '../../core/manifest/index.js';
import { createFormatter } from '../formatters/index.js';
import { applyLogLevel, globalOptions, loadCommandContext, reportFailure, type GlobalOptions } from '../context.js';

/**
 * Create the sync command.
 */
export function createSyncCommand(): Command {
  return new Command('sync')
    .description('Rewrite workspace manifests to list every schema module')
    .option('--check', 'Report drift without writing; exit 1 if any manifest is out of date')
    .option('--json', 'Output as JSON')
    .option('-q, --quiet', 'Only report errors')
    .action(async (options: SyncOptions, command: Command) => {
      try {
        process.exitCode = await runSync(options, globalOptions(command));
      } catch (error) {
        reportFailure(error, options.json);
        process.exit(1);
      }
    });
}

export interface SyncOptions {
  check?: boolean;
  json?: boolean;
  quiet?: boolean;
}

/**
 * @returns exit code: 1 on any ecosystem error, or on drift with `--check`
 */
export async function runSync(options: SyncOptions, globals: GlobalOptions): Promise<number> {
  applyLogLevel(globals, options.json || options.quiet);
  const { projectRoot, config } = await loadCommandContext(globals);

  const summary = await syncWorkspaces(projectRoot, config, { dryRun: options.check });

  if (options.json) {
    console.log(createFormatter('json').formatSync(summary));
  } else if (options.quiet) {
    for (const outcome of summary.outcomes) {
      if (outcome.error) {
        console.error(chalk.red(`✗ ${outcome.ecosystem}: ${outcome.error.message}`));
      }
    }
  } else {
    const formatter = createFormatter('human', { verbose: globals.verbose, root: projectRoot });
    console.log(formatter.formatSync(summary));
    if (options.check && summary.changed) {
      console.log();
      console.log(chalk.dim(`Run ${chalk.cyan('modsync sync')} to update the manifests.`));
    }
  }

  if (summary.hasErrors) return 1;
  if (options.check && summary.changed) return 1;
  return 0;
}
