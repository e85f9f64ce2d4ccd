/**
 * Zone Finder CLI program
 *
 * Commands:
 *   validate <file>     Whole-document validation of a data file
 *   version <file>      IANA rules version declared by a data file
 *   lookup <country>    Zones of a country, optionally matched by offset
 *
 * @module cli
 */

import { Command, InvalidArgumentError } from 'commander';

import { loadConfig, type CLIConfig } from './lib/config.js';
import { createCLILogger, type CLILogger } from './lib/logger.js';
import { EXIT_CODES, type ExitCode } from './lib/exit-codes.js';
import { validateCommand } from './commands/validate.js';
import { versionCommand } from './commands/version.js';
import { lookupCommand } from './commands/lookup.js';

// ============================================================================
// Types
// ============================================================================

export interface GlobalContext {
  readonly config: CLIConfig;
  readonly logger: CLILogger;
}

interface GlobalCliOptions {
  verbose?: boolean;
  json?: boolean;
  config?: string;
}

interface LookupCliOptions {
  file?: string;
  offset?: number;
  dst?: boolean;
  when?: string;
  bias?: string;
}

// ============================================================================
// Helpers
// ============================================================================

function parseInteger(value: string): number {
  if (!/^[-+]?\d+$/.test(value)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return Number(value);
}

async function initializeContext(options: GlobalCliOptions, dataFile?: string): Promise<GlobalContext> {
  const config = await loadConfig({
    configPath: options.config,
    overrides: {
      verbose: options.verbose,
      json: options.json,
      dataFiles: dataFile !== undefined ? [dataFile] : undefined,
    },
  });

  const logger = createCLILogger({ level: config.logLevel, json: config.json });
  return { config, logger };
}

// ============================================================================
// Program
// ============================================================================

/**
 * Build the program. Each action stores its exit code through `setExitCode`.
 */
export function createProgram(version: string, setExitCode: (code: ExitCode) => void): Command {
  const program = new Command();
  let context: GlobalContext | null = null;

  const getContext = (): GlobalContext => {
    if (context === null) {
      throw new Error('Global context not initialized.');
    }
    return context;
  };

  const run = async (name: string, command: (ctx: GlobalContext) => Promise<ExitCode>): Promise<void> => {
    const ctx = getContext();
    ctx.logger.commandStart(name);
    const code = await command(ctx);
    ctx.logger.commandEnd(code === EXIT_CODES.SUCCESS, { exit_code: code });
    setExitCode(code);
  };

  program
    .name('zone-finder')
    .description('Resolve country time zones from a country zones data file')
    .version(version, '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .zonefinderrc)')
    .hook('preAction', async (thisCommand, actionCommand) => {
      const options: GlobalCliOptions = thisCommand.opts();
      const { file }: LookupCliOptions = actionCommand.opts();
      context = await initializeContext(options, file);
    });

  program
    .command('validate <file>')
    .description('Validate a country zones data file')
    .action(async (file: string) => {
      await run('validate', ({ config, logger }) => validateCommand({ file, json: config.json }, logger));
    });

  program
    .command('version <file>')
    .description('Print the IANA rules version of a data file')
    .action(async (file: string) => {
      await run('version', ({ config, logger }) => versionCommand({ file, json: config.json }, logger));
    });

  program
    .command('lookup <country>')
    .description('Show the time zones of a country')
    .option('--file <path>', 'Data file to read (default: configured data files)')
    .option('--offset <seconds>', 'Observed total UTC offset in seconds', parseInteger)
    .option('--dst', 'The observed offset includes DST')
    .option('--when <instant>', 'ISO-8601 instant or epoch milliseconds (default: now)')
    .option('--bias <zoneId>', 'Preferred zone when several match')
    .action(async (country: string, options: LookupCliOptions) => {
      // --file reaches config.dataFiles through the preAction hook
      await run('lookup', ({ config, logger }) =>
        lookupCommand(
          {
            country,
            dataFiles: config.dataFiles,
            offsetSeconds: options.offset,
            isDst: options.dst ?? false,
            when: options.when,
            bias: options.bias,
            json: config.json,
          },
          logger
        )
      );
    });

  return program;
}

/**
 * Run the CLI against `argv` (node-style, program name included) and
 * resolve with the exit code
 */
export async function runCli(argv: readonly string[], version = '0.0.0'): Promise<ExitCode> {
  let exitCode: ExitCode = EXIT_CODES.SUCCESS;
  const program = createProgram(version, (code) => {
    exitCode = code;
  });

  await program.parseAsync([...argv]);
  return exitCode;
}
