/**
 * Stay dates: parsing the request format, expanding a stay into nights,
 * and the month anchor used for the availability fetch.
 *
 * Every date here is a luxon DateTime at UTC midnight.
 */
import { DateTime } from "luxon";
import { MalformedRequestError } from "./errors";
import type { CheckRequest } from "./request";

/**
 * Wire format of stay dates: "2024-3-5". Leading zeros are accepted on
 * parse but never written.
 */
export const REQUEST_DATE_FORMAT = "yyyy-M-d";

export interface Stay {
  arrival: DateTime;
  departure: DateTime;
}

/**
 * Parse a "YYYY-M-D" stay date
 */
export function parseStayDate(value: string, field = "date"): DateTime {
  const parsed = DateTime.fromFormat(value.trim(), REQUEST_DATE_FORMAT, { zone: "utc" });
  if (!parsed.isValid) {
    throw new MalformedRequestError(
      `Invalid ${field} "${value}": expected YYYY-M-D`,
      [parsed.invalidExplanation ?? parsed.invalidReason ?? "unparseable date"]
    );
  }
  return parsed.startOf("day");
}

/**
 * Parse both stay dates of a check request
 */
export function parseStay(request: Pick<CheckRequest, "arrival" | "departure">): Stay {
  return {
    arrival: parseStayDate(request.arrival, "arrival"),
    departure: parseStayDate(request.departure, "departure"),
  };
}

/**
 * Expand a stay into the nights that must be free: arrival up to, not
 * including, departure. A departure on or before arrival yields no nights.
 */
export function buildNights(arrival: DateTime, departure: DateTime): DateTime[] {
  const start = arrival.startOf("day");
  const nightCount = Math.floor(departure.startOf("day").diff(start, "days").days);

  const nights: DateTime[] = [];
  for (let day = 0; day < nightCount; day++) {
    nights.push(start.plus({ days: day }));
  }
  return nights;
}

/**
 * First day of the date's month - the provider serves availability per month
 */
export function monthAnchor(date: DateTime): DateTime {
  return date.startOf("month");
}

/**
 * Whether the last night of the stay falls outside the arrival month
 */
export function spansMonths(stay: Stay): boolean {
  const lastNight = stay.departure.startOf("day").minus({ days: 1 });
  return lastNight > stay.arrival && !lastNight.hasSame(stay.arrival, "month");
}

/**
 * Human form used in notifications, e.g. "Tue Mar 5"
 */
export function formatStayDate(date: DateTime): string {
  return date.setLocale("en-US").toFormat("ccc LLL d");
}

/**
 * Wire form of a stay date, e.g. "2024-3-5"
 */
export function formatRequestDate(date: DateTime): string {
  return date.toFormat(REQUEST_DATE_FORMAT);
}
