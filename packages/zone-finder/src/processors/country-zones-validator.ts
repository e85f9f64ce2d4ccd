/**
 * Whole-document validation of <country> records.
 *
 * Intended to run before a proposed data file is installed. Each country code
 * must be normalized and unique, its zone list non-empty, and its default one
 * of its zones. Zone ids are not checked against the running
 * zone database: a new data file may name zones that database has not
 * received yet.
 *
 * @module processors/country-zones-validator
 */

import { TimeZoneDataError } from '../core/errors.js';
import { normalizeCountryCode } from '../core/country-code.js';
import type { CountryZonesProcessor, ProcessResult, RawCountryEntry } from './country-zones-processor.js';

export class CountryZonesValidator implements CountryZonesProcessor {
  private readonly knownCountryCodes = new Set<string>();

  process(entry: RawCountryEntry): ProcessResult {
    const { code, defaultZoneId, zoneIds, position } = entry;

    if (normalizeCountryCode(code) !== code) {
      throw new TimeZoneDataError('NonNormalizedCountryCode', `Country code: ${code} is not normalized`, {
        position,
      });
    }
    if (this.knownCountryCodes.has(code)) {
      throw new TimeZoneDataError('DuplicateCountryCode', `Second entry for country code: ${code}`, {
        position,
      });
    }
    if (zoneIds.length === 0) {
      throw new TimeZoneDataError('EmptyZoneList', `No time zone IDs for country code: ${code}`, {
        position,
      });
    }
    if (!zoneIds.includes(defaultZoneId)) {
      throw new TimeZoneDataError(
        'DefaultNotInZoneList',
        `Default time zone ID ${defaultZoneId} for country code: ${code} is not one of the zones [${zoneIds.join(', ')}]`,
        { position, details: { defaultZoneId, zoneIds } }
      );
    }

    this.knownCountryCodes.add(code);
    return 'continue';
  }

  /** Number of countries accepted so far */
  get countryCount(): number {
    return this.knownCountryCodes.size;
  }
}
