/**
 * Document Cursor
 *
 * Forward-only view over a stream of structural events. Depth follows the
 * usual pull-parser convention: a start tag and its matching end tag report
 * the element's nesting level (the root element is 1), text reports the
 * level of its enclosing element, and both document boundaries report 0.
 *
 * @module parser/document-cursor
 */

export type EventKind = 'start-document' | 'start' | 'end' | 'text' | 'end-document';

export interface DocumentCursor {
  readonly eventKind: EventKind;
  /** Element name on start and end events, null otherwise */
  readonly name: string | null;
  /** Text content on text events, null otherwise */
  readonly text: string | null;
  readonly depth: number;
  /** Attribute of the current start element, null when absent or not on a start event */
  attribute(name: string): string | null;
  /** Advance to the next event and return its kind */
  next(): EventKind;
  positionDescription(): string;
}

export type DocumentToken =
  | { readonly kind: 'start'; readonly name: string; readonly attributes?: Readonly<Record<string, string>> }
  | { readonly kind: 'end'; readonly name: string }
  | { readonly kind: 'text'; readonly text: string };

const EMPTY_ATTRIBUTES: Readonly<Record<string, string>> = Object.freeze({});

/**
 * Cursor over any token iterator. Depth is derived from the tokens, so the
 * iterator only has to produce start, end and text tokens in document order.
 * Running out of tokens is reported as end-document regardless of how many
 * elements are still open.
 */
export class TokenStreamCursor implements DocumentCursor {
  private readonly tokens: Iterator<DocumentToken>;
  private readonly openElements: string[] = [];
  private popPending = false;
  private current: DocumentToken | null = null;
  private kind: EventKind = 'start-document';
  private currentDepth = 0;
  private eventIndex = 0;

  constructor(tokens: Iterator<DocumentToken>) {
    this.tokens = tokens;
  }

  get eventKind(): EventKind {
    return this.kind;
  }

  get name(): string | null {
    if (this.current === null || this.current.kind === 'text') return null;
    return this.current.name;
  }

  get text(): string | null {
    return this.current?.kind === 'text' ? this.current.text : null;
  }

  get depth(): number {
    return this.currentDepth;
  }

  attribute(name: string): string | null {
    if (this.current?.kind !== 'start') return null;
    const attributes = this.current.attributes ?? EMPTY_ATTRIBUTES;
    return Object.prototype.hasOwnProperty.call(attributes, name) ? attributes[name] : null;
  }

  next(): EventKind {
    if (this.kind === 'end-document') return this.kind;

    if (this.popPending) {
      this.openElements.pop();
      this.popPending = false;
    }

    const step = this.tokens.next();
    this.eventIndex++;
    if (step.done) {
      this.current = null;
      this.kind = 'end-document';
      this.currentDepth = 0;
      return this.kind;
    }

    const token = step.value;
    this.current = token;
    this.kind = token.kind;
    switch (token.kind) {
      case 'start':
        this.openElements.push(token.name);
        this.currentDepth = this.openElements.length;
        break;
      case 'end':
        this.currentDepth = this.openElements.length;
        this.popPending = true;
        break;
      case 'text':
        this.currentDepth = this.openElements.length;
        break;
    }
    return this.kind;
  }

  positionDescription(): string {
    const path = `/${this.openElements.join('/')}`;
    return `${this.describeEvent()} @ ${path} (event ${this.eventIndex})`;
  }

  private describeEvent(): string {
    switch (this.kind) {
      case 'start':
        return `START_TAG <${this.name ?? ''}>`;
      case 'end':
        return `END_TAG </${this.name ?? ''}>`;
      case 'text':
        return 'TEXT';
      case 'start-document':
        return 'START_DOCUMENT';
      case 'end-document':
        return 'END_DOCUMENT';
    }
  }
}

/**
 * Cursor over an in-memory token list
 */
export function tokenListCursor(tokens: readonly DocumentToken[]): DocumentCursor {
  return new TokenStreamCursor(tokens[Symbol.iterator]());
}
