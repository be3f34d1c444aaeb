import { Command } from 'commander';
import { resolveSchemaRoot } from '../../core/config/loader.js';
import { discoveryOptionsFromConfig } from '../../core/discovery/index.js';
import { clientRootsFromConfig, validateStructure } from '../../core/structure/index.js';
import type { StructureReport } from '../../core/structure/index.js';
import { DiscoveryError, ErrorCodes, StructureError } from '../../utils/errors.js';
import { createFormatter } from '../formatters/index.js';
import { applyLogLevel, globalOptions, loadCommandContext, reportFailure, type GlobalOptions } from '../context.js';

/**
 * Create the validate command.
 */
export function createValidateCommand(): Command {
  return new Command('validate')
    .description('Check that every module has a client package in each ecosystem')
    .option('--json', 'Output as JSON')
    .option('--strict', 'Treat orphaned client directories as failures')
    .action(async (options: ValidateOptions, command: Command) => {
      try {
        process.exitCode = await runValidate(options, globalOptions(command));
      } catch (error) {
        if (!(error instanceof StructureError) || !options.json) {
          reportFailure(error, options.json);
        }
        process.exit(1);
      }
    });
}

export interface ValidateOptions {
  json?: boolean;
  strict?: boolean;
}

/**
 * Print the structure report, then throw `StructureError` when it fails.
 */
export async function runValidate(options: ValidateOptions, globals: GlobalOptions): Promise<number> {
  applyLogLevel(globals, options.json);
  const { projectRoot, config } = await loadCommandContext(globals);
  const schemaRoot = resolveSchemaRoot(projectRoot, config);

  const report = await validateStructure(schemaRoot, clientRootsFromConfig(projectRoot, config), {
    discovery: discoveryOptionsFromConfig(config),
  });

  if (report.modules.length === 0) {
    throw new DiscoveryError(ErrorCodes.NO_MODULES, `No modules found in ${schemaRoot}`, { schemaRoot });
  }

  const formatter = createFormatter(options.json ? 'json' : 'human', {
    verbose: globals.verbose,
    root: projectRoot,
  });
  console.log(formatter.formatStructure(report));

  assertStructure(report, options.strict ?? false);
  return 0;
}

function assertStructure(report: StructureReport, strict: boolean): void {
  if (report.status === 'fail') {
    throw new StructureError(
      ErrorCodes.MISSING_CLIENTS,
      `${report.missing.length} client ${report.missing.length === 1 ? 'entry is' : 'entries are'} missing`,
      { missing: report.missing.map((m) => `${m.ecosystem}/${m.module}`) }
    );
  }
  if (strict && report.status === 'warn') {
    throw new StructureError(
      ErrorCodes.ORPHANED_CLIENTS,
      `${report.orphaned.length} orphaned client ${report.orphaned.length === 1 ? 'directory' : 'directories'} (--strict)`,
      { orphaned: report.orphaned.map((o) => `${o.ecosystem}/${o.name}`) }
    );
  }
}
