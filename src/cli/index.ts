import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createDiscoverCommand } from './commands/discover.js';
import { createSyncCommand } from './commands/sync.js';
import { createValidateCommand } from './commands/validate.js';
import { createScaffoldCommand } from './commands/scaffold.js';
import { createInitCommand } from './commands/init.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  return typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('modsync')
    .description('Keep multi-language workspace manifests in step with a schema module tree')
    .version(readVersion())
    .option('--cwd <dir>', 'Project root (default: current directory)')
    .option('-c, --config <path>', 'Config file, relative to the project root')
    .option('-v, --verbose', 'Show debug output');
  [createDiscoverCommand, createSyncCommand, createValidateCommand, createScaffoldCommand, createInitCommand]
    .forEach((cmd) => program.addCommand(cmd()));
  return program;
}
