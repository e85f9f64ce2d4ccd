/**
 * Structural Navigation Tests
 *
 * Token lists stand in for documents here so that truncated and mismatched
 * structures, which the XML tokenizer rejects up front, reach the navigation
 * checks directly.
 */

import { describe, it, expect } from 'vitest';

import { tokenListCursor, type DocumentCursor, type DocumentToken } from './document-cursor.js';
import {
  assertOnEnd,
  consumeThroughEnd,
  findOptionalStartElement,
  findRequiredStartElement,
  readElementText,
} from './navigation.js';
import { catchTimeZoneDataError } from '../__tests__/utils/errors.js';
import { end, start, text } from '../__tests__/utils/tokens.js';

function cursorAfter(tokens: readonly DocumentToken[], steps: number): DocumentCursor {
  const cursor = tokenListCursor(tokens);
  for (let i = 0; i < steps; i++) cursor.next();
  return cursor;
}

describe('findRequiredStartElement / findOptionalStartElement', () => {
  it('skips whole non-matching subtrees, including nested same-named elements', () => {
    const cursor = cursorAfter(
      [
        start('root'),
        start('other'),
        start('target', { nested: 'yes' }),
        end('target'),
        end('other'),
        start('target', { nested: 'no' }),
        end('target'),
        end('root'),
      ],
      1
    );

    findRequiredStartElement(cursor, 'target');

    expect(cursor.eventKind).toBe('start');
    expect(cursor.name).toBe('target');
    expect(cursor.depth).toBe(2);
    expect(cursor.attribute('nested')).toBe('no');
  });

  it('skips non-matching leaf elements and elements holding text', () => {
    const cursor = cursorAfter(
      [start('root'), start('a'), end('a'), start('b'), text('skipped'), end('b'), start('target'), end('root')],
      1
    );

    expect(findOptionalStartElement(cursor, 'target')).toBe(true);
    expect(cursor.name).toBe('target');
  });

  it('throws MissingElement when a required element is absent', () => {
    const cursor = cursorAfter([start('root'), start('other'), end('other'), end('root')], 1);

    const error = catchTimeZoneDataError(() => findRequiredStartElement(cursor, 'target'));

    expect(error.code).toBe('MissingElement');
    expect(error.message).toBe('No child element found with name target at END_TAG </root> @ /root (event 4)');
  });

  it('returns false on the enclosing end tag when an optional element is absent', () => {
    const cursor = cursorAfter([start('root'), start('other'), end('other'), end('root')], 1);

    expect(findOptionalStartElement(cursor, 'target')).toBe(false);
    expect(cursor.eventKind).toBe('end');
    expect(cursor.name).toBe('root');
  });

  it('throws UnexpectedEof when the document ends first', () => {
    const cursor = cursorAfter([start('root')], 1);

    const error = catchTimeZoneDataError(() => findOptionalStartElement(cursor, 'target'));

    expect(error.code).toBe('UnexpectedEof');
    expect(error.message).toBe('Unexpected end of document while looking for target at END_DOCUMENT @ /root (event 2)');
  });

  it('throws UnexpectedEof when a skipped subtree is truncated', () => {
    const cursor = cursorAfter([start('root'), start('other')], 1);

    const error = catchTimeZoneDataError(() => findOptionalStartElement(cursor, 'target'));

    expect(error.code).toBe('UnexpectedEof');
    expect(error.message).toMatch(/^Unexpected end of document while looking for end tag of other/);
  });
});

describe('consumeThroughEnd', () => {
  it('does not move when already on the end tag', () => {
    const cursor = cursorAfter([start('a'), end('a'), start('b')], 2);

    consumeThroughEnd(cursor, 'a');

    expect(cursor.eventKind).toBe('end');
    expect(cursor.name).toBe('a');
  });

  it('consumes from a text event through nested children', () => {
    const cursor = cursorAfter(
      [start('root'), start('a'), text('x'), start('c'), end('c'), end('a'), end('root')],
      3
    );

    consumeThroughEnd(cursor, 'a');

    expect(cursor.eventKind).toBe('end');
    expect(cursor.name).toBe('a');
    expect(cursor.depth).toBe(2);
  });

  it('consumes from a child start tag', () => {
    const cursor = cursorAfter([start('root'), start('a'), start('c'), text('x'), end('c'), end('a'), end('root')], 3);

    consumeThroughEnd(cursor, 'a');

    expect(cursor.name).toBe('a');
    expect(cursor.depth).toBe(2);
  });

  it('throws UnexpectedEndTag when another element closes at the same level', () => {
    const cursor = cursorAfter([start('root'), start('a'), start('b'), end('b'), end('root')], 3);

    const error = catchTimeZoneDataError(() => consumeThroughEnd(cursor, 'a'));

    expect(error.code).toBe('UnexpectedEndTag');
    expect(error.message).toMatch(/^Unexpected end tag while looking for end tag of a at END_TAG <\/root>/);
  });

  it('throws UnexpectedDepth when the cursor climbs above the target level', () => {
    const cursor = cursorAfter(
      [start('root'), start('a'), start('b'), end('b'), end('a'), end('root')],
      4
    );

    const error = catchTimeZoneDataError(() => consumeThroughEnd(cursor, 'c'));

    expect(error.code).toBe('UnexpectedDepth');
    expect(error.message).toBe('Unexpected depth while looking for end tag of c at END_TAG </a> @ /root/a (event 5)');
  });

  it('throws UnexpectedEof when the element never closes', () => {
    const cursor = cursorAfter([start('root'), start('a'), text('x')], 3);

    const error = catchTimeZoneDataError(() => consumeThroughEnd(cursor, 'a'));

    expect(error.code).toBe('UnexpectedEof');
  });
});

describe('readElementText', () => {
  it('returns the text and leaves the cursor on the end tag', () => {
    const cursor = cursorAfter([start('id'), text('Europe/London'), end('id')], 1);

    expect(readElementText(cursor)).toBe('Europe/London');
    expect(cursor.eventKind).toBe('end');
    expect(cursor.name).toBe('id');
  });

  it('throws MissingText for an empty element', () => {
    const cursor = cursorAfter([start('id'), end('id')], 1);

    const error = catchTimeZoneDataError(() => readElementText(cursor));

    expect(error.code).toBe('MissingText');
    expect(error.message).toBe('Text not found at END_TAG </id> @ /id (event 2)');
  });

  it('throws UnexpectedTrailingContent when a child follows the text', () => {
    const cursor = cursorAfter([start('id'), text('Europe/London'), start('b'), end('b'), end('id')], 1);

    const error = catchTimeZoneDataError(() => readElementText(cursor));

    expect(error.code).toBe('UnexpectedTrailingContent');
  });

  it('throws UnexpectedTrailingContent when the document ends after the text', () => {
    const cursor = cursorAfter([start('id'), text('Europe/London')], 1);

    expect(catchTimeZoneDataError(() => readElementText(cursor)).code).toBe('UnexpectedTrailingContent');
  });
});

describe('assertOnEnd', () => {
  it('accepts the matching end tag', () => {
    const cursor = cursorAfter([start('country'), end('country')], 2);

    expect(() => assertOnEnd(cursor, 'country')).not.toThrow();
  });

  it('throws UnexpectedTag on any other event', () => {
    const cursor = cursorAfter([start('country'), end('country')], 1);

    const error = catchTimeZoneDataError(() => assertOnEnd(cursor, 'country'));

    expect(error.code).toBe('UnexpectedTag');
    expect(error.message).toBe('Expected end tag of country at START_TAG <country> @ /country (event 1)');
  });
});
