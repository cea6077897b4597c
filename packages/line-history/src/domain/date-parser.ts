import { InvalidDateFormatError } from "@lineage/core";

export const SUPPORTED_DATE_FORMATS: readonly string[] = [
  "ISO 8601 / RFC 3339 (YYYY-MM-DDTHH:MM:SSZ or YYYY-MM-DDTHH:MM:SS+HH:MM)",
  "RFC 2822 (Mon, 01 Jan 2023 00:00:00 GMT)",
  "YYYY-MM-DD",
  "YYYY-MM-DD HH:MM:SS",
];

type CalendarFields = {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
};

const RFC3339_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[Tt ](\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?(?:([Zz])|([+-])(\d{2}):(\d{2}))$/;

const RFC2822_PATTERN =
  /^(?:(Mon|Tue|Wed|Thu|Fri|Sat|Sun),\s*)?(\d{1,2})\s+(Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)\s+(\d{4})\s+(\d{2}):(\d{2})(?::(\d{2}))?\s+([+-]\d{4}|UT|GMT|Z|[ECMP][SD]T)$/i;

const DATE_ONLY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const DATE_TIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

const MONTHS = ["jan", "feb", "mar", "apr", "may", "jun", "jul", "aug", "sep", "oct", "nov", "dec"];

const NAMED_ZONE_OFFSET_MINUTES: Readonly<Record<string, number>> = {
  UT: 0,
  GMT: 0,
  Z: 0,
  EST: -5 * 60,
  EDT: -4 * 60,
  CST: -6 * 60,
  CDT: -5 * 60,
  MST: -7 * 60,
  MDT: -6 * 60,
  PST: -8 * 60,
  PDT: -7 * 60,
};

const isLeapYear = (year: number): boolean => (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;

const DAYS_PER_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

const daysInMonth = (year: number, month: number): number =>
  month === 2 && isLeapYear(year) ? 29 : (DAYS_PER_MONTH[month - 1] ?? 0);

const toInt = (value: string | undefined): number => (value === undefined ? 0 : Number.parseInt(value, 10));

const toMilliseconds = (fraction: string | undefined): number =>
  fraction === undefined ? 0 : Math.floor(Number(`0.${fraction}`) * 1000);

const isValidCalendar = (fields: CalendarFields): boolean =>
  fields.month >= 1 &&
  fields.month <= 12 &&
  fields.day >= 1 &&
  fields.day <= daysInMonth(fields.year, fields.month) &&
  fields.hour < 24 &&
  fields.minute < 60 &&
  fields.second < 60;

const toUtcDate = (fields: CalendarFields, offsetMinutes: number): Date | null => {
  if (!isValidCalendar(fields)) {
    return null;
  }

  // setUTCFullYear, unlike Date.UTC, does not map years 0-99 onto 1900-1999
  const date = new Date(0);
  date.setUTCFullYear(fields.year, fields.month - 1, fields.day);
  date.setUTCHours(fields.hour, fields.minute, fields.second, fields.millisecond);
  return new Date(date.getTime() - offsetMinutes * 60_000);
};

const parseRfc3339 = (text: string): Date | null => {
  const match = RFC3339_PATTERN.exec(text);
  if (match === null) {
    return null;
  }

  const [, year, month, day, hour, minute, second, fraction, zulu, sign, offsetHours, offsetMinutes] = match;
  const offsetHoursValue = toInt(offsetHours);
  const offsetMinutesValue = toInt(offsetMinutes);
  if (zulu === undefined && (offsetHoursValue > 23 || offsetMinutesValue > 59)) {
    return null;
  }

  const offset = zulu === undefined ? (sign === "-" ? -1 : 1) * (offsetHoursValue * 60 + offsetMinutesValue) : 0;

  return toUtcDate(
    {
      year: toInt(year),
      month: toInt(month),
      day: toInt(day),
      hour: toInt(hour),
      minute: toInt(minute),
      second: toInt(second),
      millisecond: toMilliseconds(fraction),
    },
    offset,
  );
};

const parseZoneOffset = (zone: string): number | null => {
  const named = NAMED_ZONE_OFFSET_MINUTES[zone.toUpperCase()];
  if (named !== undefined) {
    return named;
  }

  const numeric = /^([+-])(\d{2})(\d{2})$/.exec(zone);
  if (numeric === null) {
    return null;
  }

  const [, sign, hours, minutes] = numeric;
  const minutesValue = toInt(minutes);
  if (minutesValue > 59) {
    return null;
  }

  return (sign === "-" ? -1 : 1) * (toInt(hours) * 60 + minutesValue);
};

const parseRfc2822 = (text: string): Date | null => {
  const match = RFC2822_PATTERN.exec(text);
  if (match === null) {
    return null;
  }

  const [, , day, monthName, year, hour, minute, second, zone] = match;
  const monthIndex = MONTHS.indexOf((monthName ?? "").toLowerCase());
  const offset = parseZoneOffset(zone ?? "");
  if (monthIndex === -1 || offset === null) {
    return null;
  }

  return toUtcDate(
    {
      year: toInt(year),
      month: monthIndex + 1,
      day: toInt(day),
      hour: toInt(hour),
      minute: toInt(minute),
      second: toInt(second),
      millisecond: 0,
    },
    offset,
  );
};

const parseDateOnly = (text: string): Date | null => {
  const match = DATE_ONLY_PATTERN.exec(text);
  if (match === null) {
    return null;
  }

  const [, year, month, day] = match;
  return toUtcDate(
    { year: toInt(year), month: toInt(month), day: toInt(day), hour: 0, minute: 0, second: 0, millisecond: 0 },
    0,
  );
};

const parseDateTime = (text: string): Date | null => {
  const match = DATE_TIME_PATTERN.exec(text);
  if (match === null) {
    return null;
  }

  const [, year, month, day, hour, minute, second] = match;
  return toUtcDate(
    {
      year: toInt(year),
      month: toInt(month),
      day: toInt(day),
      hour: toInt(hour),
      minute: toInt(minute),
      second: toInt(second),
      millisecond: 0,
    },
    0,
  );
};

const PARSERS: readonly ((text: string) => Date | null)[] = [
  parseRfc3339,
  parseRfc2822,
  parseDateOnly,
  parseDateTime,
];

/**
 * Parses a user supplied date into a UTC instant. Formats are tried in a fixed order and the first
 * match wins. Timestamps without a zone are only accepted in the `YYYY-MM-DD HH:MM:SS` form, which
 * is read as UTC.
 */
export const parseDate = (text: string): Date => {
  const trimmed = text.trim();
  for (const parse of PARSERS) {
    const parsed = parse(trimmed);
    if (parsed !== null) {
      return parsed;
    }
  }

  throw new InvalidDateFormatError(text, SUPPORTED_DATE_FORMATS);
};
