/**
 * Zone database backed by luxon's IANA zones (and through them, the tz data
 * bundled with the runtime's Intl implementation).
 *
 * @module zones/luxon-zone-database
 */

import { DateTime, IANAZone } from 'luxon';

import type { ResolvedTimeZone, ZoneDatabase, ZoneOffset } from './zone-database.js';

class LuxonTimeZone implements ResolvedTimeZone {
  constructor(
    readonly id: string,
    private readonly zone: IANAZone
  ) {}

  /**
   * The DST flag is luxon's `isInDST`: true when the offset exceeds the
   * zone's offset on January 1st or in May of the same year. tz data's own
   * DST flag is not exposed, so a zone that moved permanently to its former
   * summer offset reports DST for the rest of that year.
   */
  offsetAt(whenMillis: number): ZoneOffset {
    // luxon offsets are whole minutes
    const offsetSeconds = this.zone.offset(whenMillis) * 60;
    const isDst = DateTime.fromMillis(whenMillis, { zone: this.zone }).isInDST;
    return { offsetSeconds, isDst };
  }

  toString(): string {
    return this.id;
  }
}

export class LuxonZoneDatabase implements ZoneDatabase {
  isKnownZoneId(zoneId: string): boolean {
    return zoneId.length > 0 && IANAZone.isValidZone(zoneId);
  }

  resolve(zoneId: string): ResolvedTimeZone | null {
    if (!this.isKnownZoneId(zoneId)) {
      return null;
    }
    const zone = IANAZone.create(zoneId);
    return zone.isValid ? new LuxonTimeZone(zoneId, zone) : null;
  }
}

export const luxonZoneDatabase: ZoneDatabase = new LuxonZoneDatabase();
