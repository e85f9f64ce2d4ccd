/**
 * Document sources that record how their readers are used
 */

import type { DocumentSource } from '../../source/document-source.js';

export interface CountingSource extends DocumentSource {
  readonly opened: number;
  readonly closed: number;
  /** Replace the content returned by readers opened from now on */
  setDocument(xml: string): void;
}

export function countingSource(initialXml: string): CountingSource {
  let xml = initialXml;
  let opened = 0;
  let closed = 0;

  return {
    description: '<counting>',
    get opened() {
      return opened;
    },
    get closed() {
      return closed;
    },
    setDocument(next: string) {
      xml = next;
    },
    open() {
      opened++;
      const content = xml;
      return {
        read: () => content,
        close: () => {
          closed++;
        },
      };
    },
  };
}
