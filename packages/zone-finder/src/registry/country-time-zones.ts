/**
 * Country Time Zones Registry
 *
 * Holds the validated time zone data for one country and resolves its zone
 * ids on demand.
 *
 * @module registry/country-time-zones
 */

import { logger as defaultLogger, type Logger } from '../core/utils/logger.js';
import type { ResolvedTimeZone, ZoneDatabase } from '../zones/zone-database.js';
import { findZoneByOffset, type ZoneBias } from './offset-matcher.js';

/**
 * Information about a country's time zones. Immutable once built; a newer
 * parse replaces the whole object.
 */
export class CountryTimeZones {
  readonly countryCode: string;
  /**
   * Zone to use when only the country is known. Null when the data named a
   * zone the zone database does not recognize.
   */
  readonly defaultTimeZoneId: string | null;
  /**
   * Zone ids in the data file's priority order. Can be empty when none of
   * the configured ids were recognized.
   */
  readonly timeZoneIds: readonly string[];

  private readonly zoneDatabase: ZoneDatabase;
  private readonly logger: Logger;
  private timeZones: readonly ResolvedTimeZone[] | null = null;

  constructor(
    countryCode: string,
    defaultTimeZoneId: string | null,
    timeZoneIds: readonly string[],
    zoneDatabase: ZoneDatabase,
    logger: Logger = defaultLogger
  ) {
    this.countryCode = countryCode;
    this.defaultTimeZoneId = defaultTimeZoneId;
    this.timeZoneIds = Object.freeze([...timeZoneIds]);
    this.zoneDatabase = zoneDatabase;
    this.logger = logger;
  }

  /**
   * Resolved zones in the same order as timeZoneIds, computed once. Ids the
   * zone database no longer resolves are skipped.
   */
  getTimeZones(): readonly ResolvedTimeZone[] {
    if (this.timeZones === null) {
      const resolved: ResolvedTimeZone[] = [];
      for (const zoneId of this.timeZoneIds) {
        const zone = this.zoneDatabase.resolve(zoneId);
        if (zone === null) {
          this.logger.warn('Skipping invalid zone', { zoneId, countryCode: this.countryCode });
          continue;
        }
        resolved.push(zone);
      }
      this.timeZones = Object.freeze(resolved);
    }
    return this.timeZones;
  }

  /**
   * Zone of this country that has / would have had the given offset and DST
   * state at `whenMillis`, preferring `bias` among several matches.
   */
  lookupByOffset(
    offsetSeconds: number,
    isDst: boolean,
    whenMillis: number,
    bias: ZoneBias = null
  ): ResolvedTimeZone | null {
    return findZoneByOffset(this.getTimeZones(), offsetSeconds, isDst, whenMillis, bias);
  }
}

/**
 * Build a CountryTimeZones from raw document data, keeping only what the
 * zone database recognizes. Unknown zone ids are dropped and an unknown
 * default becomes null; neither is an error, since the data file and the
 * zone database are updated independently.
 */
export function createValidatedCountryTimeZones(
  countryCode: string,
  defaultTimeZoneId: string,
  countryTimeZoneIds: readonly string[],
  position: string,
  zoneDatabase: ZoneDatabase,
  logger: Logger = defaultLogger
): CountryTimeZones {
  const validTimeZoneIds: string[] = [];
  for (const zoneId of countryTimeZoneIds) {
    if (zoneDatabase.isKnownZoneId(zoneId)) {
      validTimeZoneIds.push(zoneId);
    } else {
      logger.warn('Skipping invalid zone', { zoneId, countryCode, position });
    }
  }

  let validDefault: string | null = defaultTimeZoneId;
  if (!zoneDatabase.isKnownZoneId(defaultTimeZoneId)) {
    logger.warn('Invalid default time zone ID', { defaultTimeZoneId, countryCode, position });
    validDefault = null;
  }

  return new CountryTimeZones(countryCode, validDefault, validTimeZoneIds, zoneDatabase, logger);
}
