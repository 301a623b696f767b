import config from "../config.js";

function formatDate(now: Date, timeZone?: string): string {
  const options: Intl.DateTimeFormatOptions = {
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    ...(timeZone ? { timeZone } : {}),
  };
  return new Intl.DateTimeFormat("en-CA", options).format(now); // YYYY-MM-DD
}

/**
 * Calendar date (YYYY-MM-DD) of `now` in the reference time zone.
 * This is the day boundary the protein counter resets on.
 */
export function getReferenceDate(now: Date = new Date(), timeZone: string = config.REFERENCE_TIMEZONE): string {
  try {
    return formatDate(now, timeZone);
  } catch (err) {
    console.warn(
      `[getReferenceDate] Invalid timezone "${timeZone}", falling back to UTC:`,
      err instanceof Error ? err.message : err,
    );
    return formatDate(now, "UTC");
  }
}
