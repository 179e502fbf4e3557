const MONTHS = ["jan", "feb", "mar", "apr", "may", "jun", "jul", "aug", "sep", "oct", "nov", "dec"];

// [Day,] DD Mon YYYY HH:MM[:SS] ...  (zone and trailing comment are not needed)
const DAY_FIRST =
  /^\s*(?:[A-Za-z]+,?\s+)?(\d{1,2})\s+([A-Za-z]+)\.?,?\s+(\d{2,4}),?\s+(\d{1,2}):(\d{2})(?::(\d{2}))?(?:\s|$)/;
// [Day,] Mon DD YYYY HH:MM[:SS]
const MONTH_FIRST =
  /^\s*(?:[A-Za-z]+,?\s+)?([A-Za-z]+)\.?\s+(\d{1,2}),?\s+(\d{2,4}),?\s+(\d{1,2}):(\d{2})(?::(\d{2}))?(?:\s|$)/;

interface DateFields {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

function monthIndex(name: string): number {
  return MONTHS.indexOf(name.slice(0, 3).toLowerCase()) + 1;
}

function expandYear(year: string): number {
  const value = parseInt(year, 10);
  if (year.length > 2) return value;
  return value > 68 ? 1900 + value : 2000 + value;
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function parseFields(raw: string): DateFields | null {
  let day: string;
  let month: string;
  let rest: string[];

  const dayFirst = DAY_FIRST.exec(raw);
  const monthFirst = dayFirst ? null : MONTH_FIRST.exec(raw);
  if (dayFirst) {
    [, day, month, ...rest] = dayFirst;
  } else if (monthFirst) {
    [, month, day, ...rest] = monthFirst;
  } else {
    return null;
  }

  const [year, hour, minute, second] = rest;
  const fields: DateFields = {
    year: expandYear(year),
    month: monthIndex(month),
    day: parseInt(day, 10),
    hour: parseInt(hour, 10),
    minute: parseInt(minute, 10),
    second: second ? parseInt(second, 10) : 0,
  };

  if (
    fields.month < 1 ||
    fields.year < 1 ||
    fields.day < 1 ||
    fields.day > daysInMonth(fields.year, fields.month) ||
    fields.hour > 23 ||
    fields.minute > 59 ||
    fields.second > 59
  ) {
    return null;
  }
  return fields;
}

const pad = (value: number, width = 2) => String(value).padStart(width, "0");

/**
 * Normalize a Date header to "YYYY-MM-DD HH:MM:SS" in the sender's own
 * offset, i.e. the wall-clock time as written.
 *
 * Returns the input unchanged when it does not parse.
 */
export function normalizeDate(raw: string | null | undefined): string {
  if (!raw) return "";

  const fields = parseFields(raw);
  if (!fields) return raw;

  return (
    `${pad(fields.year, 4)}-${pad(fields.month)}-${pad(fields.day)} ` +
    `${pad(fields.hour)}:${pad(fields.minute)}:${pad(fields.second)}`
  );
}
