import * as path from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import { ModuleScaffolder } from '../../core/scaffold/index.js';
import type { ScaffoldResult } from '../../core/scaffold/index.js';
import { logger as log } from '../../utils/logger.js';
import { JsonFormatter, createFormatter } from '../formatters/index.js';
import { applyLogLevel, globalOptions, loadCommandContext, reportFailure, type GlobalOptions } from '../context.js';

/**
 * Create the scaffold command.
 */
export function createScaffoldCommand(): Command {
  return new Command('scaffold')
    .description('Create a new schema module from the template set, then sync workspaces')
    .argument('<name>', 'Module name (lowercase, e.g. user-management)')
    .argument('<description>', 'One-line module description ("" for the default)')
    .argument('[version]', 'API version', 'v1')
    .argument('[entity]', 'Main entity name in TitleCase (default: module name in TitleCase)')
    .option('--dry-run', 'Show what would be generated without writing')
    .option('--no-sync', 'Skip workspace sync after creating the module')
    .option('--json', 'Output as JSON')
    .action(
      async (
        name: string,
        description: string,
        version: string,
        entity: string | undefined,
        options: ScaffoldCommandOptions,
        command: Command
      ) => {
        try {
          process.exitCode = await runScaffold({ name, description, version, entity }, options, globalOptions(command));
        } catch (error) {
          reportFailure(error, options.json);
          process.exit(1);
        }
      }
    );
}

export interface ScaffoldArguments {
  name: string;
  description: string;
  version?: string;
  entity?: string;
}

export interface ScaffoldCommandOptions {
  dryRun?: boolean;
  /** Commander sets this to false for --no-sync */
  sync?: boolean;
  json?: boolean;
}

/**
 * @returns exit code: 1 when the module was created but an ecosystem failed to sync
 */
export async function runScaffold(
  args: ScaffoldArguments,
  options: ScaffoldCommandOptions,
  globals: GlobalOptions
): Promise<number> {
  applyLogLevel(globals, options.json);
  const { projectRoot, config } = await loadCommandContext(globals);

  const scaffolder = new ModuleScaffolder(projectRoot, config);
  const result = await scaffolder.scaffold(
    {
      moduleName: args.name,
      description: args.description,
      version: args.version,
      entityName: args.entity,
    },
    { dryRun: options.dryRun, sync: options.sync }
  );

  if (options.json) {
    console.log(JSON.stringify(toJson(result), null, 2));
  } else {
    printResult(result, projectRoot, globals.verbose ?? false);
  }

  return result.sync?.hasErrors ? 1 : 0;
}

function toJson(result: ScaffoldResult): Record<string, unknown> {
  return {
    module: result.module.moduleName,
    description: result.module.description,
    version: result.module.version,
    entity: result.module.entityName,
    module_dir: result.moduleDir,
    dry_run: result.dryRun,
    files: result.files.map((f) => ({ source: f.source, target: f.target, path: f.path })),
    sync: result.sync ? new JsonFormatter().transformSync(result.sync) : null,
  };
}

function printResult(result: ScaffoldResult, projectRoot: string, verbose: boolean): void {
  const { module } = result;

  if (result.dryRun) {
    console.log();
    console.log(chalk.bold('Dry Run - Would generate:'));
    for (const file of result.files) {
      console.log();
      console.log(chalk.dim(`Path: ${path.relative(projectRoot, file.path)}`));
      console.log(chalk.dim('─'.repeat(60)));
      console.log(file.content);
      console.log(chalk.dim('─'.repeat(60)));
    }
    return;
  }

  console.log();
  for (const file of result.files) {
    log.success(`Created ${path.relative(projectRoot, file.path)}`);
  }

  if (result.sync) {
    console.log();
    console.log(createFormatter('human', { verbose, root: projectRoot }).formatSync(result.sync));
  }

  console.log();
  console.log(chalk.dim('Next steps:'));
  console.log(`  1. Define ${chalk.cyan(module.entityName)} in ${chalk.cyan(path.relative(projectRoot, result.moduleDir))}`);
  console.log(`  2. Create a client package for ${chalk.cyan(module.moduleName)} in each ecosystem`);
  console.log(`  3. Run ${chalk.cyan('modsync validate')} to check the client tree`);
}
