/**
 * Zone Finder - country to time zone resolution
 *
 * Resolves the time zones used in a country from a country zones XML
 * document, and picks the zone matching an observed UTC offset and DST
 * state. Intended for callers that learn a country and an offset (from
 * network signalling, for example) without knowing the zone itself.
 *
 * @packageDocumentation
 */

// Facade
export {
  TimeZoneFinder,
  TZLOOKUP_FILE_NAME,
  EMPTY_COUNTRY_ZONES_DOCUMENT,
  type TimeZoneFinderOptions,
} from './finder/time-zone-finder.js';

// Registry
export { CountryTimeZones, createValidatedCountryTimeZones } from './registry/country-time-zones.js';
export { findZoneByOffset, offsetMatchesAtTime, type ZoneBias } from './registry/offset-matcher.js';

// Zone database
export type { ZoneDatabase, ResolvedTimeZone, ZoneOffset } from './zones/zone-database.js';
export { LuxonZoneDatabase, luxonZoneDatabase } from './zones/luxon-zone-database.js';

// Document traversal
export {
  walkCountryZones,
  readSchemaVersion,
  type WalkOutcome,
  type CursorFactory,
} from './parser/country-zones-walker.js';
export {
  TokenStreamCursor,
  tokenListCursor,
  type DocumentCursor,
  type DocumentToken,
  type EventKind,
} from './parser/document-cursor.js';
export { createXmlDocumentCursor } from './parser/xml-document-cursor.js';
export {
  seekStartElement,
  findRequiredStartElement,
  findOptionalStartElement,
  consumeThroughEnd,
  readElementText,
  assertOnEnd,
} from './parser/navigation.js';

// Processors
export type { CountryZonesProcessor, ProcessResult, RawCountryEntry } from './processors/country-zones-processor.js';
export { CountryZonesValidator } from './processors/country-zones-validator.js';
export { SelectiveCountryZonesExtractor } from './processors/selective-country-zones-extractor.js';

// Sources
export {
  fileDocumentSource,
  stringDocumentSource,
  type DocumentSource,
  type DocumentReader,
} from './source/document-source.js';

// Errors and utilities
export {
  TimeZoneDataError,
  TIME_ZONE_DATA_ERROR_CODES,
  isTimeZoneDataError,
  type TimeZoneDataErrorCode,
} from './core/errors.js';
export { normalizeCountryCode } from './core/country-code.js';
export { logger, createLogger, StructuredLogger, type Logger, type LogLevel, type LogMetadata } from './core/utils/logger.js';
