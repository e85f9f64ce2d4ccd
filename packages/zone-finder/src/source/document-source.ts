/**
 * Document Sources
 *
 * A source hands out a fresh reader for every traversal so the same logical
 * document can be walked repeatedly. Readers must be closed by whoever opened
 * them, on every exit path.
 *
 * @module source/document-source
 */

import { closeSync, existsSync, openSync, readFileSync, statSync } from 'node:fs';
import { resolve } from 'node:path';
import { TextDecoder } from 'node:util';

import { TimeZoneDataError } from '../core/errors.js';

/**
 * A single-use handle on the document content
 */
export interface DocumentReader {
  read(): string;
  close(): void;
}

/**
 * Factory for readers over one logical document
 */
export interface DocumentSource {
  /** Human-readable origin, used in log metadata */
  readonly description: string;
  /** Throws TimeZoneDataError(SourceUnavailable) when the reader cannot be created */
  open(): DocumentReader;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Decode file content as strict UTF-8. A leading byte order mark is dropped.
 *
 * @throws TimeZoneDataError(MalformedDocument) on invalid byte sequences
 */
export function decodeUtf8(bytes: Uint8Array, description: string): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (error) {
    throw new TimeZoneDataError('MalformedDocument', `Malformed document: invalid UTF-8 in ${description}`, {
      cause: error,
    });
  }
}

/**
 * Source backed by a file on disk. The file must exist and be a regular file
 * when the source is created; it is reopened for each traversal.
 */
export function fileDocumentSource(path: string): DocumentSource {
  const filePath = resolve(path);
  if (!existsSync(filePath)) {
    throw new TimeZoneDataError('SourceUnavailable', `${filePath} does not exist`);
  }
  if (!statSync(filePath).isFile()) {
    throw new TimeZoneDataError('SourceUnavailable', `${filePath} must be a regular readable file`);
  }

  return {
    description: filePath,
    open(): DocumentReader {
      let fd: number;
      try {
        fd = openSync(filePath, 'r');
      } catch (error) {
        throw new TimeZoneDataError('SourceUnavailable', `Unable to open ${filePath}: ${describeError(error)}`, {
          cause: error,
        });
      }

      let closed = false;
      return {
        read: () => {
          let bytes: Buffer;
          try {
            bytes = readFileSync(fd);
          } catch (error) {
            throw new TimeZoneDataError('SourceUnavailable', `Unable to read ${filePath}: ${describeError(error)}`, {
              cause: error,
            });
          }
          return decodeUtf8(bytes, filePath);
        },
        close: () => {
          if (closed) return;
          closed = true;
          closeSync(fd);
        },
      };
    },
  };
}

/**
 * Source backed by an in-memory document
 */
export function stringDocumentSource(xml: string, description = '<in-memory>'): DocumentSource {
  return {
    description,
    open: () => ({
      read: () => xml,
      close: () => undefined,
    }),
  };
}
