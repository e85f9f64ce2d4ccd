/**
 * Zone Finder Error Types
 *
 * A single error class carries every failure raised while reading a country
 * zones document: structural problems found by the cursor traversal,
 * whole-document validation failures and sources that cannot be opened.
 *
 * Lookups convert these to "no result"; only validate() lets them escape.
 */

/**
 * Error codes raised while traversing or validating a document
 */
export const TIME_ZONE_DATA_ERROR_CODES = {
  MALFORMED_DOCUMENT: 'MalformedDocument',
  MISSING_ELEMENT: 'MissingElement',
  UNEXPECTED_EOF: 'UnexpectedEof',
  UNEXPECTED_DEPTH: 'UnexpectedDepth',
  UNEXPECTED_END_TAG: 'UnexpectedEndTag',
  UNEXPECTED_TAG: 'UnexpectedTag',
  MISSING_TEXT: 'MissingText',
  UNEXPECTED_TRAILING_CONTENT: 'UnexpectedTrailingContent',
  MISSING_ATTRIBUTE: 'MissingAttribute',
  DUPLICATE_COUNTRY_CODE: 'DuplicateCountryCode',
  EMPTY_ZONE_LIST: 'EmptyZoneList',
  DEFAULT_NOT_IN_ZONE_LIST: 'DefaultNotInZoneList',
  NON_NORMALIZED_COUNTRY_CODE: 'NonNormalizedCountryCode',
  SOURCE_UNAVAILABLE: 'SourceUnavailable',
} as const;

export type TimeZoneDataErrorCode =
  (typeof TIME_ZONE_DATA_ERROR_CODES)[keyof typeof TIME_ZONE_DATA_ERROR_CODES];

/**
 * Error thrown when a country zones document cannot be read or is invalid.
 *
 * @example
 * ```typescript
 * try {
 *   finder.validate();
 * } catch (error) {
 *   if (isTimeZoneDataError(error) && error.code === 'DuplicateCountryCode') {
 *     // reject the proposed data file
 *   }
 * }
 * ```
 */
export class TimeZoneDataError extends Error {
  readonly code: TimeZoneDataErrorCode;
  /** Cursor position description at the time of failure, when known */
  readonly position?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    code: TimeZoneDataErrorCode,
    message: string,
    options: { position?: string; details?: Record<string, unknown>; cause?: unknown } = {}
  ) {
    super(options.position ? `${message} at ${options.position}` : message, {
      cause: options.cause,
    });
    this.name = 'TimeZoneDataError';
    this.code = code;
    this.position = options.position;
    this.details = options.details;
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, TimeZoneDataError.prototype);
  }
}

export function isTimeZoneDataError(value: unknown): value is TimeZoneDataError {
  return value instanceof TimeZoneDataError;
}
