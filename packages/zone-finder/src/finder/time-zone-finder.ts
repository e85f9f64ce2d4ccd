/**
 * Time Zone Finder
 *
 * Finds the time zones used in a country, and the zone matching an observed
 * UTC offset and DST state, from a country zones document.
 *
 * The most recently resolved country is cached. The cache slot is read and
 * replaced synchronously, and only after a record has been fully built, so a
 * caller sees either the previous record or the new one. Failed or
 * unmatched lookups leave it untouched.
 *
 * @module finder/time-zone-finder
 */

import { normalizeCountryCode } from '../core/country-code.js';
import { isTimeZoneDataError } from '../core/errors.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import { readSchemaVersion, walkCountryZones, type CursorFactory } from '../parser/country-zones-walker.js';
import { createXmlDocumentCursor } from '../parser/xml-document-cursor.js';
import { CountryZonesValidator } from '../processors/country-zones-validator.js';
import { SelectiveCountryZonesExtractor } from '../processors/selective-country-zones-extractor.js';
import type { CountryTimeZones } from '../registry/country-time-zones.js';
import type { ZoneBias } from '../registry/offset-matcher.js';
import { fileDocumentSource, stringDocumentSource, type DocumentSource } from '../source/document-source.js';
import { luxonZoneDatabase } from '../zones/luxon-zone-database.js';
import type { ResolvedTimeZone, ZoneDatabase } from '../zones/zone-database.js';

export const TZLOOKUP_FILE_NAME = 'tzlookup.xml';

/**
 * Document used when no data file can be opened: valid, with no countries
 */
export const EMPTY_COUNTRY_ZONES_DOCUMENT = '<timezones><countryzones /></timezones>';

export interface TimeZoneFinderOptions {
  /** Defaults to the luxon-backed IANA zone database */
  readonly zoneDatabase?: ZoneDatabase;
  readonly logger?: Logger;
  /** Tokenizer adapter; defaults to the fast-xml-parser cursor */
  readonly createCursor?: CursorFactory;
}

function describeError(error: unknown): Record<string, unknown> {
  if (isTimeZoneDataError(error)) {
    return { code: error.code, error: error.message };
  }
  return { error: error instanceof Error ? error.message : String(error) };
}

export class TimeZoneFinder {
  private readonly source: DocumentSource;
  private readonly zoneDatabase: ZoneDatabase;
  private readonly logger: Logger;
  private readonly createCursor: CursorFactory;

  // Last country looked up successfully.
  private lastCountryTimeZones: CountryTimeZones | null = null;

  constructor(source: DocumentSource, options: TimeZoneFinderOptions = {}) {
    this.source = source;
    this.zoneDatabase = options.zoneDatabase ?? luxonZoneDatabase;
    this.logger = options.logger ?? createLogger({ module: 'finder' });
    this.createCursor = options.createCursor ?? createXmlDocumentCursor;
  }

  /**
   * Create a finder over a data file. No in-depth validation of the content
   * happens here; see validate().
   *
   * @throws TimeZoneDataError(SourceUnavailable) when the file is missing or not a regular file
   */
  static createInstance(path: string, options: TimeZoneFinderOptions = {}): TimeZoneFinder {
    return new TimeZoneFinder(fileDocumentSource(path), options);
  }

  /**
   * Create a finder over the first of `paths` that can be opened. When none
   * can, the failures are logged and the finder falls back to an empty
   * document, so lookups simply find nothing.
   */
  static createInstanceWithFallback(paths: readonly string[], options: TimeZoneFinderOptions = {}): TimeZoneFinder {
    const failures: Record<string, unknown>[] = [];
    for (const path of paths) {
      try {
        return TimeZoneFinder.createInstance(path, options);
      } catch (error) {
        // A missing first candidate is normal; only report when all fail.
        if (!isTimeZoneDataError(error)) throw error;
        failures.push({ path, ...describeError(error) });
      }
    }

    const logger = options.logger ?? createLogger({ module: 'finder' });
    logger.error('No valid file found in set, falling back to empty data', { paths, failures });
    return TimeZoneFinder.fromString(EMPTY_COUNTRY_ZONES_DOCUMENT, options);
  }

  /**
   * Create a finder over an in-memory document
   */
  static fromString(xml: string, options: TimeZoneFinderOptions = {}): TimeZoneFinder {
    return new TimeZoneFinder(stringDocumentSource(xml), options);
  }

  /**
   * Parse the whole document and check every country record.
   *
   * @throws TimeZoneDataError when the document is invalid or cannot be read
   */
  validate(): void {
    const validator = new CountryZonesValidator();
    walkCountryZones(this.source, validator, this.createCursor);
    this.logger.debug('Document validated', {
      source: this.source.description,
      countries: validator.countryCount,
    });
  }

  /**
   * The IANA rules version associated with the data, or null when there is
   * no version information or the document cannot be read.
   */
  getIanaVersion(): string | null {
    try {
      return readSchemaVersion(this.source, this.createCursor);
    } catch (error) {
      this.logger.debug('Unable to read IANA version', describeError(error));
      return null;
    }
  }

  /**
   * Zone to use when only the country is known. Null when the country is not
   * recognized, the lookup failed, or the data's default was not recognized.
   */
  lookupDefaultTimeZoneIdByCountry(countryCode: string): string | null {
    return this.findCountryTimeZones(countryCode)?.defaultTimeZoneId ?? null;
  }

  /**
   * Zone ids used in the country, in priority order. Null when the country is
   * not recognized or the lookup failed; empty when none of its ids are
   * recognized.
   */
  lookupTimeZoneIdsByCountry(countryCode: string): readonly string[] | null {
    return this.findCountryTimeZones(countryCode)?.timeZoneIds ?? null;
  }

  /**
   * Resolved zones used in the country, with the same absence rules as
   * lookupTimeZoneIdsByCountry().
   */
  lookupTimeZonesByCountry(countryCode: string): readonly ResolvedTimeZone[] | null {
    return this.findCountryTimeZones(countryCode)?.getTimeZones() ?? null;
  }

  /**
   * Zone in the country that has / would have had the given offset and DST
   * state at `whenMillis`. Among several matches the `bias` zone wins when it
   * is one of them; otherwise the first match in the data's order.
   */
  lookupTimeZoneByCountryAndOffset(
    countryCode: string,
    offsetSeconds: number,
    isDst: boolean,
    whenMillis: number,
    bias: ZoneBias = null
  ): ResolvedTimeZone | null {
    const countryTimeZones = this.findCountryTimeZones(countryCode);
    if (countryTimeZones === null) {
      return null;
    }
    return countryTimeZones.lookupByOffset(offsetSeconds, isDst, whenMillis, bias);
  }

  /**
   * The full record for a country, or null
   */
  lookupCountryTimeZones(countryCode: string): CountryTimeZones | null {
    return this.findCountryTimeZones(countryCode);
  }

  private findCountryTimeZones(countryCode: string): CountryTimeZones | null {
    const normalized = normalizeCountryCode(countryCode);

    const cached = this.lastCountryTimeZones;
    if (cached !== null && cached.countryCode === normalized) {
      return cached;
    }

    const extractor = new SelectiveCountryZonesExtractor(normalized, this.zoneDatabase, this.logger);
    try {
      walkCountryZones(this.source, extractor, this.createCursor);
    } catch (error) {
      if (!isTimeZoneDataError(error)) throw error;
      this.logger.warn('Error reading country zones', {
        countryCode: normalized,
        source: this.source.description,
        ...describeError(error),
      });
      return null;
    }

    const countryTimeZones = extractor.validatedCountryTimeZones;
    if (countryTimeZones === null) {
      // No match: keep the cached value.
      return null;
    }

    this.lastCountryTimeZones = countryTimeZones;
    return countryTimeZones;
  }
}
