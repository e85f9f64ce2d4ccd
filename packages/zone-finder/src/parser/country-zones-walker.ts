/**
 * Country Zones Document Walker
 *
 * Drives structural navigation over a country zones document and hands each
 * <country> record to a processor. The expected structure is:
 *
 * ```xml
 * <timezones ianaversion="2017b">
 *   <countryzones>
 *     <country code="us" default="America/New_York">
 *       <id>America/New_York</id>
 *       ...
 *       <id>America/Los_Angeles</id>
 *     </country>
 *     <country code="gb" default="Europe/London">
 *       <id>Europe/London</id>
 *     </country>
 *   </countryzones>
 * </timezones>
 * ```
 *
 * Unknown elements are skipped wherever they appear.
 *
 * @module parser/country-zones-walker
 */

import { TimeZoneDataError } from '../core/errors.js';
import type { DocumentSource } from '../source/document-source.js';
import type { CountryZonesProcessor } from '../processors/country-zones-processor.js';
import type { DocumentCursor } from './document-cursor.js';
import { createXmlDocumentCursor } from './xml-document-cursor.js';
import {
  assertOnEnd,
  consumeThroughEnd,
  findOptionalStartElement,
  findRequiredStartElement,
  readElementText,
} from './navigation.js';

export const TIMEZONES_ELEMENT = 'timezones';
export const IANA_VERSION_ATTRIBUTE = 'ianaversion';
export const COUNTRY_ZONES_ELEMENT = 'countryzones';
export const COUNTRY_ELEMENT = 'country';
export const COUNTRY_CODE_ATTRIBUTE = 'code';
export const DEFAULT_TIME_ZONE_ID_ATTRIBUTE = 'default';
export const ID_ELEMENT = 'id';

export type WalkOutcome = 'completed' | 'halted';

export type CursorFactory = (document: string) => DocumentCursor;

/**
 * Open the source, run `use` over a fresh cursor and always release the reader
 */
function withCursor<T>(
  source: DocumentSource,
  createCursor: CursorFactory,
  use: (cursor: DocumentCursor) => T
): T {
  const reader = source.open();
  try {
    return use(createCursor(reader.read()));
  } finally {
    reader.close();
  }
}

/**
 * Walk the whole document, feeding every <country> to `processor`.
 *
 * Returns 'halted' when the processor stopped the walk. A completed walk has
 * also verified the document runs through to </timezones>.
 */
export function walkCountryZones(
  source: DocumentSource,
  processor: CountryZonesProcessor,
  createCursor: CursorFactory = createXmlDocumentCursor
): WalkOutcome {
  return withCursor(source, createCursor, (cursor) => {
    findRequiredStartElement(cursor, TIMEZONES_ELEMENT);

    // Only one <countryzones> is expected; anything before it is skipped.
    findRequiredStartElement(cursor, COUNTRY_ZONES_ELEMENT);

    if (processCountryZones(cursor, processor) === 'halted') {
      return 'halted';
    }

    assertOnEnd(cursor, COUNTRY_ZONES_ELEMENT);
    cursor.next();

    // Skip anything up to </timezones> so a truncated file is detected.
    consumeThroughEnd(cursor, TIMEZONES_ELEMENT);
    assertOnEnd(cursor, TIMEZONES_ELEMENT);
    return 'completed';
  });
}

/**
 * Read the optional `ianaversion` attribute of the top-level element
 */
export function readSchemaVersion(
  source: DocumentSource,
  createCursor: CursorFactory = createXmlDocumentCursor
): string | null {
  return withCursor(source, createCursor, (cursor) => {
    findRequiredStartElement(cursor, TIMEZONES_ELEMENT);
    return cursor.attribute(IANA_VERSION_ATTRIBUTE);
  });
}

function requireAttribute(cursor: DocumentCursor, name: string, what: string): string {
  const value = cursor.attribute(name);
  if (value === null || value.length === 0) {
    throw new TimeZoneDataError('MissingAttribute', `Unable to find ${what}`, {
      position: cursor.positionDescription(),
      details: { attribute: name },
    });
  }
  return value;
}

function processCountryZones(cursor: DocumentCursor, processor: CountryZonesProcessor): WalkOutcome {
  while (findOptionalStartElement(cursor, COUNTRY_ELEMENT)) {
    const code = requireAttribute(cursor, COUNTRY_CODE_ATTRIBUTE, 'country code');
    const defaultZoneId = requireAttribute(cursor, DEFAULT_TIME_ZONE_ID_ATTRIBUTE, 'default time zone ID');
    const position = cursor.positionDescription();

    const zoneIds = parseZoneIds(cursor);
    if (processor.process({ code, defaultZoneId, zoneIds, position }) === 'halt') {
      return 'halted';
    }

    assertOnEnd(cursor, COUNTRY_ELEMENT);
  }
  return 'completed';
}

function parseZoneIds(cursor: DocumentCursor): readonly string[] {
  const zoneIds: string[] = [];

  while (findOptionalStartElement(cursor, ID_ELEMENT)) {
    const zoneId = readElementText(cursor);
    assertOnEnd(cursor, ID_ELEMENT);
    zoneIds.push(zoneId);
  }

  return Object.freeze(zoneIds);
}
