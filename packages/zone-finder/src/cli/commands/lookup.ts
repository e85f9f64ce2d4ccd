/**
 * Lookup Command
 *
 * Shows the time zones of a country and, given an observed offset, the zone
 * that matches it.
 *
 * Usage:
 *   zone-finder lookup <country> [options]
 *
 * Options:
 *   --file <path>        Data file (default: configured data files, first readable wins)
 *   --offset <seconds>   Observed total UTC offset in seconds
 *   --dst                The observed offset includes DST
 *   --when <instant>     ISO-8601 instant or epoch milliseconds (default: now)
 *   --bias <zoneId>      Preferred zone when several match
 *
 * @module cli/commands/lookup
 */

import type { Logger } from '../../core/utils/logger.js';
import { TimeZoneFinder } from '../../finder/time-zone-finder.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import { formatJson, formatTable, formatUtcOffset, printError, printOutput } from '../lib/output.js';

export interface LookupOptions {
  readonly country: string;
  readonly dataFiles: readonly string[];
  readonly offsetSeconds?: number;
  readonly isDst: boolean;
  readonly when?: string;
  readonly bias?: string;
  readonly json: boolean;
}

/**
 * Parse an ISO-8601 instant or an epoch milliseconds value
 */
export function parseInstant(value: string): number | null {
  if (/^-?\d+$/.test(value)) {
    return Number(value);
  }
  const millis = Date.parse(value);
  return Number.isNaN(millis) ? null : millis;
}

export async function lookupCommand(options: LookupOptions, logger: Logger): Promise<ExitCode> {
  let whenMillis = Date.now();
  if (options.when !== undefined) {
    const parsed = parseInstant(options.when);
    if (parsed === null) {
      printError(`Invalid instant: ${options.when}`);
      return EXIT_CODES.ERRORS;
    }
    whenMillis = parsed;
  }

  const finder = TimeZoneFinder.createInstanceWithFallback(options.dataFiles, { logger });
  const countryTimeZones = finder.lookupCountryTimeZones(options.country);
  if (countryTimeZones === null) {
    printError(`Unknown country: ${options.country}`);
    return EXIT_CODES.ERRORS;
  }

  const match =
    options.offsetSeconds === undefined
      ? undefined
      : finder.lookupTimeZoneByCountryAndOffset(
          options.country,
          options.offsetSeconds,
          options.isDst,
          whenMillis,
          options.bias ?? null
        );

  if (options.json) {
    printOutput(
      formatJson({
        country: countryTimeZones.countryCode,
        defaultTimeZoneId: countryTimeZones.defaultTimeZoneId,
        timeZoneIds: countryTimeZones.timeZoneIds,
        ...(match !== undefined ? { match: match?.id ?? null } : {}),
      })
    );
    return EXIT_CODES.SUCCESS;
  }

  const rows = countryTimeZones.getTimeZones().map((zone) => {
    const offset = zone.offsetAt(whenMillis);
    return {
      zoneId: zone.id === countryTimeZones.defaultTimeZoneId ? `${zone.id} *` : zone.id,
      offset: formatUtcOffset(offset.offsetSeconds),
      dst: offset.isDst ? 'yes' : 'no',
    };
  });

  printOutput(`Country: ${countryTimeZones.countryCode}`);
  printOutput(`Default: ${countryTimeZones.defaultTimeZoneId ?? '(none)'}`);
  printOutput(
    formatTable(rows, [
      { key: 'zoneId', header: 'Zone' },
      { key: 'offset', header: 'UTC offset', align: 'right' },
      { key: 'dst', header: 'DST' },
    ])
  );
  if (match !== undefined) {
    printOutput(`Match: ${match?.id ?? '(no match)'}`);
  }
  return EXIT_CODES.SUCCESS;
}
