export const REFERENCE_TIME_ZONE = "Europe/Amsterdam";

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

/**
 * Calendar date (YYYY-MM-DD) of an instant as seen in the given timezone.
 */
export function calendarDate(instant: Date, timeZone: string = REFERENCE_TIME_ZONE): string {
  const parts = formatterFor(timeZone).formatToParts(instant);
  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? "";

  return `${part("year")}-${part("month")}-${part("day")}`;
}

/** The day before a YYYY-MM-DD date, across month and year boundaries. */
export function previousCalendarDate(date: string): string {
  const [year, month, day] = date.split("-").map(Number);
  const previous = new Date(Date.UTC(year, month - 1, day - 1));

  const yyyy = String(previous.getUTCFullYear()).padStart(4, "0");
  const mm = String(previous.getUTCMonth() + 1).padStart(2, "0");
  const dd = String(previous.getUTCDate()).padStart(2, "0");
  return `${yyyy}-${mm}-${dd}`;
}

export function yesterdayIn(now: Date, timeZone: string = REFERENCE_TIME_ZONE): string {
  return previousCalendarDate(calendarDate(now, timeZone));
}
