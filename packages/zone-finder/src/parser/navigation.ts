/**
 * Structural Navigation
 *
 * Element-seeking primitives over a DocumentCursor. They tolerate unknown
 * elements anywhere (skipping whole subtrees) while still detecting
 * truncation and mismatched tags. All movement is forward-only.
 *
 * @module parser/navigation
 */

import { TimeZoneDataError } from '../core/errors.js';
import type { DocumentCursor } from './document-cursor.js';

/**
 * Find a start element named `name` among the children of the current
 * element. Non-matching child elements are consumed whole, so matching
 * elements nested deeper are never returned.
 *
 * Returns true with the cursor on the start element when found. When the
 * enclosing element ends first, throws MissingElement if `required`,
 * otherwise returns false with the cursor on that end element.
 */
export function seekStartElement(cursor: DocumentCursor, name: string, required: boolean): boolean {
  let kind = cursor.next();
  while (kind !== 'end-document') {
    if (kind === 'start') {
      const currentName = cursor.name ?? '';
      if (currentName === name) {
        return true;
      }
      cursor.next();
      consumeThroughEnd(cursor, currentName);
    } else if (kind === 'end') {
      if (required) {
        throw new TimeZoneDataError('MissingElement', `No child element found with name ${name}`, {
          position: cursor.positionDescription(),
        });
      }
      return false;
    }
    kind = cursor.next();
  }

  throw new TimeZoneDataError('UnexpectedEof', `Unexpected end of document while looking for ${name}`, {
    position: cursor.positionDescription(),
  });
}

export function findRequiredStartElement(cursor: DocumentCursor, name: string): void {
  seekStartElement(cursor, name, true);
}

export function findOptionalStartElement(cursor: DocumentCursor, name: string): boolean {
  return seekStartElement(cursor, name, false);
}

/**
 * Consume the remaining content of element `name` and stop on its end tag.
 *
 * The cursor must be on that end tag already, on text inside the element,
 * or on the start of a child element.
 */
export function consumeThroughEnd(cursor: DocumentCursor, name: string): void {
  if (cursor.eventKind === 'end' && cursor.name === name) {
    return;
  }

  // A child start tag sits one level below the end tag being looked for
  let requiredDepth = cursor.depth;
  if (cursor.eventKind === 'start') {
    requiredDepth--;
  }

  while (cursor.eventKind !== 'end-document') {
    const kind = cursor.next();
    const currentDepth = cursor.depth;

    if (kind === 'end-document') break;

    if (currentDepth < requiredDepth) {
      throw new TimeZoneDataError('UnexpectedDepth', `Unexpected depth while looking for end tag of ${name}`, {
        position: cursor.positionDescription(),
      });
    }
    if (currentDepth === requiredDepth && kind === 'end') {
      if (cursor.name === name) {
        return;
      }
      throw new TimeZoneDataError('UnexpectedEndTag', `Unexpected end tag while looking for end tag of ${name}`, {
        position: cursor.positionDescription(),
      });
    }
  }

  throw new TimeZoneDataError('UnexpectedEof', `Unexpected end of document while looking for end tag of ${name}`, {
    position: cursor.positionDescription(),
  });
}

/**
 * Read the text of the current element. Call with the cursor on the start
 * tag; leaves it on the matching end tag.
 */
export function readElementText(cursor: DocumentCursor): string {
  if (cursor.next() !== 'text') {
    throw new TimeZoneDataError('MissingText', 'Text not found', {
      position: cursor.positionDescription(),
    });
  }
  const text = cursor.text ?? '';

  if (cursor.next() !== 'end') {
    throw new TimeZoneDataError('UnexpectedTrailingContent', 'Unexpected nested tag or end of document when expecting text end', {
      position: cursor.positionDescription(),
    });
  }
  return text;
}

export function assertOnEnd(cursor: DocumentCursor, name: string): void {
  if (cursor.eventKind !== 'end' || cursor.name !== name) {
    throw new TimeZoneDataError('UnexpectedTag', `Expected end tag of ${name}`, {
      position: cursor.positionDescription(),
    });
  }
}
