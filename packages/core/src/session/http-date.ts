/**
 * Strict timestamp parsers for rate-limit headers.
 *
 * `Date.parse` accepts far too much, so the two formats the API uses are
 * matched exactly. Both return epoch milliseconds or undefined.
 */

const RFC3339 =
  /^(\d{4})-(\d{2})-(\d{2})[Tt](\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?(?:([Zz])|([+-])(\d{2}):(\d{2}))$/;

const RFC1123 =
  /^(Mon|Tue|Wed|Thu|Fri|Sat|Sun), (\d{2}) (Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec) (\d{4}) (\d{2}):(\d{2}):(\d{2}) ([A-Z]{3,4})$/;

const MONTHS = [
  "Jan",
  "Feb",
  "Mar",
  "Apr",
  "May",
  "Jun",
  "Jul",
  "Aug",
  "Sep",
  "Oct",
  "Nov",
  "Dec",
];

type DateParts = {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
};

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function toEpoch(parts: DateParts): number | undefined {
  const { year, month, day, hour, minute, second, millisecond } = parts;
  if (
    month < 1 ||
    month > 12 ||
    day < 1 ||
    day > daysInMonth(year, month) ||
    hour > 23 ||
    minute > 59 ||
    second > 59
  ) {
    return undefined;
  }
  return Date.UTC(year, month - 1, day, hour, minute, second, millisecond);
}

/**
 * Parse `2006-01-02T15:04:05.999Z` or with a numeric offset.
 */
export function parseRfc3339(value: string): number | undefined {
  const match = RFC3339.exec(value);
  if (!match) {
    return undefined;
  }

  const fraction = match[7] ?? "";
  const epoch = toEpoch({
    year: Number(match[1]),
    month: Number(match[2]),
    day: Number(match[3]),
    hour: Number(match[4]),
    minute: Number(match[5]),
    second: Number(match[6]),
    millisecond: Number(fraction.padEnd(3, "0").slice(0, 3)),
  });
  if (epoch === undefined) {
    return undefined;
  }
  if (match[8] !== undefined) {
    return epoch;
  }

  const offsetHours = Number(match[10]);
  const offsetMinutes = Number(match[11]);
  if (offsetHours > 23 || offsetMinutes > 59) {
    return undefined;
  }
  const sign = match[9] === "-" ? -1 : 1;
  return epoch - sign * (offsetHours * 60 + offsetMinutes) * 60_000;
}

/**
 * Parse `Mon, 02 Jan 2006 15:04:05 GMT`. Zone abbreviations carry no
 * offset and are read as UTC.
 */
export function parseHttpDate(value: string): number | undefined {
  const match = RFC1123.exec(value);
  if (!match) {
    return undefined;
  }
  return toEpoch({
    year: Number(match[4]),
    month: MONTHS.indexOf(match[3] ?? "") + 1,
    day: Number(match[2]),
    hour: Number(match[5]),
    minute: Number(match[6]),
    second: Number(match[7]),
    millisecond: 0,
  });
}
