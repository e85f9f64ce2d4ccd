/**
 * Offset / DST matching over an ordered list of candidate zones.
 *
 * @module registry/offset-matcher
 */

import type { ResolvedTimeZone } from '../zones/zone-database.js';

/**
 * Preferred zone among several matches, given as a zone or its id
 */
export type ZoneBias = ResolvedTimeZone | string | null;

function biasId(bias: ZoneBias): string | null {
  if (bias === null) return null;
  return typeof bias === 'string' ? bias : bias.id;
}

/**
 * Whether `zone` has / would have had the given total offset and DST state at
 * `whenMillis`. The DST flag must agree before the offset is compared.
 */
export function offsetMatchesAtTime(
  zone: ResolvedTimeZone,
  offsetSeconds: number,
  isDst: boolean,
  whenMillis: number
): boolean {
  const actual = zone.offsetAt(whenMillis);
  if (actual.isDst !== isDst) {
    return false;
  }
  return actual.offsetSeconds === offsetSeconds;
}

/**
 * Find the zone among `candidates` matching the offset and DST state.
 *
 * Candidates are tried in list order. Without a bias the first match wins.
 * With a bias, a match whose id equals the bias id wins wherever it sits in
 * the list; failing that, the first match is returned. Null when nothing
 * matches.
 */
export function findZoneByOffset(
  candidates: readonly ResolvedTimeZone[],
  offsetSeconds: number,
  isDst: boolean,
  whenMillis: number,
  bias: ZoneBias = null
): ResolvedTimeZone | null {
  const preferredId = biasId(bias);
  let firstMatch: ResolvedTimeZone | null = null;

  for (const candidate of candidates) {
    if (!offsetMatchesAtTime(candidate, offsetSeconds, isDst, whenMillis)) {
      continue;
    }

    if (preferredId === null) {
      return candidate;
    }
    if (firstMatch === null) {
      firstMatch = candidate;
    }
    if (candidate.id === preferredId) {
      return candidate;
    }
  }

  return firstMatch;
}
