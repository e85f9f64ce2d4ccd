/**
 * Extracts validated time zone information for one country and halts the
 * walk as soon as that country is found. Other countries are skipped without
 * any validation.
 *
 * @module processors/selective-country-zones-extractor
 */

import { normalizeCountryCode } from '../core/country-code.js';
import { logger as defaultLogger, type Logger } from '../core/utils/logger.js';
import { createValidatedCountryTimeZones, type CountryTimeZones } from '../registry/country-time-zones.js';
import type { ZoneDatabase } from '../zones/zone-database.js';
import type { CountryZonesProcessor, ProcessResult, RawCountryEntry } from './country-zones-processor.js';

export class SelectiveCountryZonesExtractor implements CountryZonesProcessor {
  private validated: CountryTimeZones | null = null;

  constructor(
    private readonly countryCodeToMatch: string,
    private readonly zoneDatabase: ZoneDatabase,
    private readonly logger: Logger = defaultLogger
  ) {}

  process(entry: RawCountryEntry): ProcessResult {
    const countryCode = normalizeCountryCode(entry.code);
    if (countryCode !== this.countryCodeToMatch) {
      return 'continue';
    }

    this.validated = createValidatedCountryTimeZones(
      countryCode,
      entry.defaultZoneId,
      entry.zoneIds,
      entry.position,
      this.zoneDatabase,
      this.logger
    );
    return 'halt';
  }

  /** The matched country, or null when no record matched */
  get validatedCountryTimeZones(): CountryTimeZones | null {
    return this.validated;
  }
}
