/**
 * Version Command
 *
 * Prints the IANA rules version a country zones file declares.
 *
 * Usage:
 *   zone-finder version <file>
 *
 * @module cli/commands/version
 */

import { isTimeZoneDataError } from '../../core/errors.js';
import type { Logger } from '../../core/utils/logger.js';
import { TimeZoneFinder } from '../../finder/time-zone-finder.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import { formatJson, printError, printOutput } from '../lib/output.js';

export interface VersionOptions {
  readonly file: string;
  readonly json: boolean;
}

export async function versionCommand(options: VersionOptions, logger: Logger): Promise<ExitCode> {
  let finder: TimeZoneFinder;
  try {
    finder = TimeZoneFinder.createInstance(options.file, { logger });
  } catch (error) {
    if (!isTimeZoneDataError(error)) throw error;
    printError(error.message);
    return EXIT_CODES.CONFIG_ERROR;
  }

  const ianaVersion = finder.getIanaVersion();
  printOutput(options.json ? formatJson({ file: options.file, ianaVersion }) : ianaVersion ?? '(none)');
  return EXIT_CODES.SUCCESS;
}
