import { Command } from 'commander';
import * as path from 'node:path';
import chalk from 'chalk';
import { DEFAULT_CONFIG_PATH, getConfigPath } from '../../core/config/loader.js';
import { fileExists, writeFile } from '../../utils/file-system.js';
import { logger as log } from '../../utils/logger.js';
import { applyLogLevel, globalOptions, reportFailure, type GlobalOptions } from '../context.js';
import { CONFIG_TEMPLATE, MODULE_PROTO_TEMPLATE, README_TEMPLATE } from './init-templates.js';

const TEMPLATE_DIR = 'templates/module';

/**
 * Create the init command.
 */
export function createInitCommand(): Command {
  return new Command('init')
    .description('Write a default configuration and module template set')
    .option('--force', 'Overwrite existing files')
    .action(async (options: InitOptions, command: Command) => {
      try {
        process.exitCode = await runInit(options, globalOptions(command));
      } catch (error) {
        reportFailure(error);
        process.exit(1);
      }
    });
}

export interface InitOptions {
  force?: boolean;
}

export async function runInit(options: InitOptions, globals: GlobalOptions): Promise<number> {
  applyLogLevel(globals);
  const projectRoot = path.resolve(globals.cwd ?? process.cwd());
  const configPath = getConfigPath(projectRoot);

  if (!options.force && (await fileExists(configPath))) {
    log.warn(`${DEFAULT_CONFIG_PATH} already exists. Use --force to reinitialize.`);
    return 0;
  }

  console.log();
  console.log(chalk.bold('Initializing modsync...'));
  console.log();

  const files: Array<[string, string]> = [
    [DEFAULT_CONFIG_PATH, CONFIG_TEMPLATE],
    [`${TEMPLATE_DIR}/README.md.template`, README_TEMPLATE],
    [`${TEMPLATE_DIR}/module.proto.template`, MODULE_PROTO_TEMPLATE],
  ];

  for (const [relative, content] of files) {
    const target = path.join(projectRoot, relative);
    if (!options.force && (await fileExists(target))) {
      log.info(`Kept existing ${relative}`);
      continue;
    }
    await writeFile(target, content);
    log.success(`Created ${relative}`);
  }

  console.log();
  console.log(chalk.bold.green('modsync initialized successfully!'));
  console.log();
  console.log(chalk.dim('Next steps:'));
  console.log(`  1. Edit ${chalk.cyan(DEFAULT_CONFIG_PATH)} to match your client layout`);
  console.log(`  2. Run ${chalk.cyan('modsync sync --check')} to see which manifests are out of date`);
  console.log(`  3. Run ${chalk.cyan('modsync scaffold <name> "<description>"')} to add a module`);
  console.log();
  return 0;
}
