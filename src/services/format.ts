import type { Decimal } from "decimal.js";

/**
 * Render a decimal with a comma separator and no grouping. Without `places`
 * the value keeps its own precision.
 */
export function formatDecimal(value: Decimal, places?: number): string {
  const normalized = value.isZero() ? value.abs() : value;
  const text = places === undefined ? normalized.toFixed() : normalized.toFixed(places);
  return text.replace(".", ",");
}

const dateFormatters = new Map<string, Intl.DateTimeFormat>();

/** DD.MM.YYYY as seen in the given IANA time zone. */
export function formatDate(date: Date, timeZone: string): string {
  let formatter = dateFormatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-GB", {
      timeZone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
    });
    dateFormatters.set(timeZone, formatter);
  }

  const parts = Object.fromEntries(
    formatter.formatToParts(date).map((part) => [part.type, part.value]),
  );
  return `${parts.day}.${parts.month}.${parts.year}`;
}
