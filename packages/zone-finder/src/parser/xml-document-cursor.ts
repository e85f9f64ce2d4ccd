/**
 * XML Document Cursor
 *
 * Adapts fast-xml-parser to the DocumentCursor contract. The document is
 * checked for well-formedness first, then parsed with `preserveOrder` and
 * the ordered node tree is flattened into structural tokens lazily, one
 * element at a time, as the cursor advances.
 *
 * Reported events: start tags (with attributes), end tags and non-blank text.
 * Declarations, processing instructions and comments are dropped, and text is
 * trimmed.
 *
 * @module parser/xml-document-cursor
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';

import { TimeZoneDataError } from '../core/errors.js';
import { TokenStreamCursor, type DocumentCursor, type DocumentToken } from './document-cursor.js';

const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

function createOrderedParser(): XMLParser {
  return new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: '',
    textNodeName: TEXT_KEY,
    // Keep values as strings: zone ids and codes are never numbers
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: true,
    ignoreDeclaration: true,
    ignorePiTags: true,
    processEntities: true,
    htmlEntities: false,
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readAttributes(value: unknown): Readonly<Record<string, string>> | undefined {
  if (!isRecord(value)) return undefined;
  const attributes: Record<string, string> = {};
  for (const [name, attributeValue] of Object.entries(value)) {
    if (typeof attributeValue === 'string') {
      attributes[name] = attributeValue;
    }
  }
  return attributes;
}

interface Frame {
  readonly nodes: readonly unknown[];
  readonly name: string | null;
  index: number;
}

/**
 * Flatten an ordered node list depth-first using an explicit stack
 */
function* flattenOrderedNodes(root: readonly unknown[]): Generator<DocumentToken, void, undefined> {
  const stack: Frame[] = [{ nodes: root, name: null, index: 0 }];

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    if (frame.index >= frame.nodes.length) {
      stack.pop();
      if (frame.name !== null) {
        yield { kind: 'end', name: frame.name };
      }
      continue;
    }

    const node = frame.nodes[frame.index++];
    if (!isRecord(node)) continue;

    for (const [key, value] of Object.entries(node)) {
      if (key === ATTRIBUTES_KEY) continue;

      if (key === TEXT_KEY) {
        const text = typeof value === 'string' ? value : String(value);
        if (text.length > 0) {
          yield { kind: 'text', text };
        }
        break;
      }

      yield { kind: 'start', name: key, attributes: readAttributes(node[ATTRIBUTES_KEY]) };
      stack.push({ nodes: Array.isArray(value) ? value : [], name: key, index: 0 });
      break;
    }
  }
}

/**
 * Create a cursor over an XML document string.
 *
 * @throws TimeZoneDataError(MalformedDocument) when the document is not well formed
 */
export function createXmlDocumentCursor(xml: string): DocumentCursor {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { code, msg, line, col } = validation.err;
    throw new TimeZoneDataError('MalformedDocument', `Malformed document: ${msg}`, {
      position: `line ${line}, column ${col}`,
      details: { tokenizerCode: code },
    });
  }

  const parsed: unknown = createOrderedParser().parse(xml);
  const root: readonly unknown[] = Array.isArray(parsed) ? parsed : [];
  return new TokenStreamCursor(flattenOrderedNodes(root));
}
