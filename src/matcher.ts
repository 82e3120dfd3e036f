import type { DateTime } from "luxon";

/**
 * The only status that counts as bookable
 */
export const AVAILABLE_STATUS = "Available";

/**
 * One campsite's status per calendar date ("yyyy-MM-dd")
 */
export interface SiteAvailability {
  siteId: string;
  campsiteType?: string;
  availabilities: Map<string, string>;
}

/**
 * One campground's availability for one calendar month, keyed by site ID
 */
export type MonthlyAvailability = Map<string, SiteAvailability>;

/**
 * Check whether a site is bookable on every night. Stops at the first
 * night that is missing or not available.
 */
export function isSiteFreeForNights(site: SiteAvailability, nights: DateTime[]): boolean {
  if (nights.length === 0) {
    return false;
  }

  for (const night of nights) {
    if (site.availabilities.get(toDateKey(night)) !== AVAILABLE_STATUS) {
      return false;
    }
  }
  return true;
}

/**
 * Find the sites that are available for every one of the given nights.
 *
 * An empty `nights` list matches nothing: a stay with no nights is a bad
 * request, not a free stay. Results are sorted so alerts read the same
 * from run to run.
 */
export function findFullyAvailableSites(
  availability: MonthlyAvailability | undefined,
  nights: DateTime[]
): string[] {
  if (!availability || nights.length === 0) {
    return [];
  }

  const matches: string[] = [];
  for (const [siteId, site] of availability) {
    if (isSiteFreeForNights(site, nights)) {
      matches.push(siteId);
    }
  }
  return matches.sort();
}

/**
 * Key used for per-date lookups
 */
export function toDateKey(date: DateTime): string {
  return date.toFormat("yyyy-MM-dd");
}
