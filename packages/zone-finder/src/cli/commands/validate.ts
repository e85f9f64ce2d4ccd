/**
 * Validate Command
 *
 * Whole-document validation of a country zones file, meant to gate the
 * installation of a new data file.
 *
 * Usage:
 *   zone-finder validate <file>
 *
 * Exit codes:
 *   0  document is valid
 *   3  file cannot be opened
 *   5  document is malformed or fails validation
 *
 * @module cli/commands/validate
 */

import { isTimeZoneDataError } from '../../core/errors.js';
import type { Logger } from '../../core/utils/logger.js';
import { TimeZoneFinder } from '../../finder/time-zone-finder.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import { formatJson, printError, printOutput, printSuccess } from '../lib/output.js';

export interface ValidateOptions {
  readonly file: string;
  readonly json: boolean;
}

export async function validateCommand(options: ValidateOptions, logger: Logger): Promise<ExitCode> {
  let finder: TimeZoneFinder;
  try {
    finder = TimeZoneFinder.createInstance(options.file, { logger });
  } catch (error) {
    if (!isTimeZoneDataError(error)) throw error;
    printError(error.message);
    return EXIT_CODES.CONFIG_ERROR;
  }

  try {
    finder.validate();
  } catch (error) {
    if (!isTimeZoneDataError(error)) throw error;
    if (options.json) {
      printOutput(formatJson({ file: options.file, valid: false, code: error.code, message: error.message }));
    } else {
      printError(`${error.code}: ${error.message}`);
    }
    return EXIT_CODES.DATA_INTEGRITY_ERROR;
  }

  const ianaVersion = finder.getIanaVersion();
  if (options.json) {
    printOutput(formatJson({ file: options.file, valid: true, ianaVersion }));
  } else {
    printSuccess(`${options.file} is valid (ianaversion: ${ianaVersion ?? 'none'})`);
  }
  return EXIT_CODES.SUCCESS;
}
