/**
 * Zone Database Contract
 *
 * The finder never computes offsets itself; it asks a zone database which
 * ids exist and what a zone's offset and DST state are at an instant.
 *
 * @module zones/zone-database
 */

/**
 * Offset of a zone at one instant
 */
export interface ZoneOffset {
  /** Total offset from UTC in seconds, DST included */
  readonly offsetSeconds: number;
  readonly isDst: boolean;
}

/**
 * A zone id the database was able to resolve
 */
export interface ResolvedTimeZone {
  readonly id: string;
  offsetAt(whenMillis: number): ZoneOffset;
}

export interface ZoneDatabase {
  /** Whether `zoneId` names a zone this database knows */
  isKnownZoneId(zoneId: string): boolean;
  /** Resolve a zone id, or null when the database reports it unknown */
  resolve(zoneId: string): ResolvedTimeZone | null;
}
