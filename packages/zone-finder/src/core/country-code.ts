/**
 * Lowercase ASCII is the canonical form for country codes, both in data
 * files and in lookups.
 */
export function normalizeCountryCode(countryCode: string): string {
  return countryCode.toLocaleLowerCase('en-US');
}
