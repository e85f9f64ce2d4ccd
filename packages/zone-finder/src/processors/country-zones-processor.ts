/**
 * Contract between the document walker and whatever consumes country records.
 *
 * @module processors/country-zones-processor
 */

/**
 * One <country> element as read from the document, before any validation
 */
export interface RawCountryEntry {
  /** Country code exactly as written in the document */
  readonly code: string;
  readonly defaultZoneId: string;
  /** Zone ids in document order; may be empty or contain duplicates */
  readonly zoneIds: readonly string[];
  /** Position of the <country> start tag, for diagnostics */
  readonly position: string;
}

/**
 * `halt` stops the walk early without error
 */
export type ProcessResult = 'continue' | 'halt';

export interface CountryZonesProcessor {
  /** Throws TimeZoneDataError to abort the whole traversal */
  process(entry: RawCountryEntry): ProcessResult;
}
