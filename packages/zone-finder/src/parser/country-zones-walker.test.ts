/**
 * Country Zones Walker Tests
 */

import { describe, it, expect } from 'vitest';

import { readSchemaVersion, walkCountryZones } from './country-zones-walker.js';
import { tokenListCursor, type DocumentToken } from './document-cursor.js';
import type {
  CountryZonesProcessor,
  ProcessResult,
  RawCountryEntry,
} from '../processors/country-zones-processor.js';
import { stringDocumentSource } from '../source/document-source.js';
import { catchTimeZoneDataError } from '../__tests__/utils/errors.js';
import { countingSource } from '../__tests__/utils/sources.js';
import { end, start, text } from '../__tests__/utils/tokens.js';

// =============================================================================
// Test Utilities
// =============================================================================

class RecordingProcessor implements CountryZonesProcessor {
  readonly entries: RawCountryEntry[] = [];

  constructor(private readonly haltOnCode: string | null = null) {}

  process(entry: RawCountryEntry): ProcessResult {
    this.entries.push(entry);
    return entry.code === this.haltOnCode ? 'halt' : 'continue';
  }

  codes(): string[] {
    return this.entries.map((entry) => entry.code);
  }
}

const TWO_COUNTRIES = `<timezones ianaversion="2024a">
  <countryzones>
    <country code="gb" default="Europe/London">
      <id>Europe/London</id>
    </country>
    <country code="us" default="America/New_York">
      <id>America/New_York</id>
      <id>America/Chicago</id>
    </country>
  </countryzones>
</timezones>`;

function tokenCursorFactory(tokens: readonly DocumentToken[]) {
  return () => tokenListCursor(tokens);
}

// =============================================================================
// Traversal
// =============================================================================

describe('walkCountryZones', () => {
  it('hands every country to the processor in document order', () => {
    const processor = new RecordingProcessor();

    const outcome = walkCountryZones(stringDocumentSource(TWO_COUNTRIES), processor);

    expect(outcome).toBe('completed');
    expect(processor.entries).toEqual([
      {
        code: 'gb',
        defaultZoneId: 'Europe/London',
        zoneIds: ['Europe/London'],
        position: 'START_TAG <country> @ /timezones/countryzones/country (event 3)',
      },
      {
        code: 'us',
        defaultZoneId: 'America/New_York',
        zoneIds: ['America/New_York', 'America/Chicago'],
        position: expect.stringContaining('START_TAG <country>'),
      },
    ]);
  });

  it('hands the processor a frozen zone list', () => {
    const processor = new RecordingProcessor();
    walkCountryZones(stringDocumentSource(TWO_COUNTRIES), processor);

    expect(Object.isFrozen(processor.entries[0].zoneIds)).toBe(true);
  });

  it('stops at the first country the processor halts on', () => {
    const processor = new RecordingProcessor('gb');

    expect(walkCountryZones(stringDocumentSource(TWO_COUNTRIES), processor)).toBe('halted');
    expect(processor.codes()).toEqual(['gb']);
  });

  it('skips unknown elements wherever they appear', () => {
    const xml = `<timezones>
  <header>
    <countryzones>
      <country code="xx" default="Hidden/Zone"><id>Hidden/Zone</id></country>
    </countryzones>
  </header>
  <countryzones>
    <comment>ignored</comment>
    <country code="fr" default="Europe/Paris" extra="1">
      <note><id>Not/This</id></note>
      <id>Europe/Paris</id>
    </country>
  </countryzones>
  <footer/>
</timezones>`;
    const processor = new RecordingProcessor();

    expect(walkCountryZones(stringDocumentSource(xml), processor)).toBe('completed');
    expect(processor.codes()).toEqual(['fr']);
    expect(processor.entries[0].zoneIds).toEqual(['Europe/Paris']);
  });

  it('accepts an empty country list', () => {
    const processor = new RecordingProcessor();

    expect(walkCountryZones(stringDocumentSource('<timezones><countryzones /></timezones>'), processor)).toBe(
      'completed'
    );
    expect(processor.entries).toEqual([]);
  });

  it('passes an empty zone list through to the processor', () => {
    const processor = new RecordingProcessor();
    const xml = '<timezones><countryzones><country code="aq" default="Antarctica/Troll"></country></countryzones></timezones>';

    walkCountryZones(stringDocumentSource(xml), processor);

    expect(processor.entries[0].zoneIds).toEqual([]);
  });
});

// =============================================================================
// Structural Errors
// =============================================================================

describe('walkCountryZones structural errors', () => {
  function walkXml(xml: string) {
    return catchTimeZoneDataError(() => walkCountryZones(stringDocumentSource(xml), new RecordingProcessor()));
  }

  it('reports a missing country code', () => {
    const error = walkXml(
      '<timezones><countryzones><country default="Europe/London"><id>Europe/London</id></country></countryzones></timezones>'
    );

    expect(error.code).toBe('MissingAttribute');
    expect(error.message).toMatch(/^Unable to find country code at /);
    expect(error.details).toEqual({ attribute: 'code' });
  });

  it('treats an empty default attribute as missing', () => {
    const error = walkXml(
      '<timezones><countryzones><country code="gb" default=""><id>Europe/London</id></country></countryzones></timezones>'
    );

    expect(error.code).toBe('MissingAttribute');
    expect(error.details).toEqual({ attribute: 'default' });
  });

  it('reports an id element without text', () => {
    const error = walkXml(
      '<timezones><countryzones><country code="gb" default="Europe/London"><id/></country></countryzones></timezones>'
    );

    expect(error.code).toBe('MissingText');
  });

  it('reports an id element with nested content', () => {
    const error = walkXml(
      '<timezones><countryzones><country code="gb" default="Europe/London"><id>Europe/London<b/></id></country></countryzones></timezones>'
    );

    expect(error.code).toBe('UnexpectedTrailingContent');
  });

  it('reports a document with the wrong top-level element', () => {
    const error = walkXml('<other><countryzones /></other>');

    expect(error.code).toBe('UnexpectedEof');
    expect(error.message).toMatch(/^Unexpected end of document while looking for timezones/);
  });

  it('reports a document without a countryzones element', () => {
    const error = walkXml('<timezones><header /></timezones>');

    expect(error.code).toBe('MissingElement');
    expect(error.message).toMatch(/^No child element found with name countryzones/);
  });

  it('reports a document that ends inside a country', () => {
    const tokens = [
      start('timezones'),
      start('countryzones'),
      start('country', { code: 'gb', default: 'Europe/London' }),
      start('id'),
      text('Europe/London'),
      end('id'),
    ];

    const error = catchTimeZoneDataError(() =>
      walkCountryZones(stringDocumentSource(''), new RecordingProcessor(), tokenCursorFactory(tokens))
    );

    expect(error.code).toBe('UnexpectedEof');
    expect(error.message).toMatch(/^Unexpected end of document while looking for id/);
  });

  it('reports a document that ends before </timezones>', () => {
    const tokens = [start('timezones'), start('countryzones'), end('countryzones')];

    const error = catchTimeZoneDataError(() =>
      walkCountryZones(stringDocumentSource(''), new RecordingProcessor(), tokenCursorFactory(tokens))
    );

    expect(error.code).toBe('UnexpectedEof');
    expect(error.message).toMatch(/^Unexpected end of document while looking for end tag of timezones/);
  });

  it('does not read past the country it halted on', () => {
    const tokens = [
      start('timezones'),
      start('countryzones'),
      start('country', { code: 'gb', default: 'Europe/London' }),
      start('id'),
      text('Europe/London'),
      end('id'),
      end('country'),
      start('country', { code: 'us', default: 'America/New_York' }),
    ];

    const outcome = walkCountryZones(
      stringDocumentSource(''),
      new RecordingProcessor('gb'),
      tokenCursorFactory(tokens)
    );

    expect(outcome).toBe('halted');
  });
});

// =============================================================================
// Reader Lifecycle
// =============================================================================

describe('reader lifecycle', () => {
  it('closes the reader after a completed walk', () => {
    const source = countingSource(TWO_COUNTRIES);
    walkCountryZones(source, new RecordingProcessor());

    expect(source.opened).toBe(1);
    expect(source.closed).toBe(1);
  });

  it('closes the reader after a halted walk', () => {
    const source = countingSource(TWO_COUNTRIES);
    walkCountryZones(source, new RecordingProcessor('gb'));

    expect(source.closed).toBe(1);
  });

  it('closes the reader when the document is malformed', () => {
    const source = countingSource('<timezones><countryzones>');
    catchTimeZoneDataError(() => walkCountryZones(source, new RecordingProcessor()));

    expect(source.closed).toBe(1);
  });

  it('closes the reader when the processor throws', () => {
    const source = countingSource(TWO_COUNTRIES);
    const failing: CountryZonesProcessor = {
      process: () => {
        throw new Error('processor failure');
      },
    };

    expect(() => walkCountryZones(source, failing)).toThrow('processor failure');
    expect(source.closed).toBe(1);
  });

  it('opens a fresh reader for every traversal', () => {
    const source = countingSource(TWO_COUNTRIES);
    walkCountryZones(source, new RecordingProcessor());
    walkCountryZones(source, new RecordingProcessor());

    expect(source.opened).toBe(2);
    expect(source.closed).toBe(2);
  });
});

// =============================================================================
// Schema Version
// =============================================================================

describe('readSchemaVersion', () => {
  it('returns the ianaversion attribute', () => {
    expect(readSchemaVersion(stringDocumentSource(TWO_COUNTRIES))).toBe('2024a');
  });

  it('returns null when the attribute is absent', () => {
    expect(readSchemaVersion(stringDocumentSource('<timezones><countryzones /></timezones>'))).toBeNull();
  });

  it('closes the reader', () => {
    const source = countingSource(TWO_COUNTRIES);
    readSchemaVersion(source);

    expect(source.closed).toBe(1);
  });
});
