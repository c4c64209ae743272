import { SchemaError } from "./errors";

export interface ParsedTimestamp {
  /** Wall-clock value as `YYYY-MM-DDTHH:MM:SS`, no zone. */
  iso: string;
  date: string;
  hour: number;
  dayOfWeek: number;
}

const ISO_PATTERN =
  /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[ T](\d{1,2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?\s*(?:Z|[+-]\d{2}:?\d{2})?$/i;
const US_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?\s*([AP]M)?)?$/i;

const pad = (value: number, width = 2) => String(value).padStart(width, "0");

const toInt = (value: string | undefined, fallback = 0) => (value === undefined ? fallback : Number(value));

/** Monday = 0 … Sunday = 6. */
export const isoWeekday = (year: number, month: number, day: number): number => {
  const sundayBased = new Date(Date.UTC(year, month - 1, day)).getUTCDay();
  return (sundayBased + 6) % 7;
};

const isValidDate = (year: number, month: number, day: number) => {
  if (month < 1 || month > 12 || day < 1) return false;
  const probe = new Date(Date.UTC(year, month - 1, day));
  return probe.getUTCFullYear() === year && probe.getUTCMonth() === month - 1 && probe.getUTCDate() === day;
};

const to24Hour = (hour: number, meridiem: string | undefined): number | null => {
  if (!meridiem) return hour;
  if (hour < 1 || hour > 12) return null;
  const isPm = meridiem.toUpperCase() === "PM";
  if (hour === 12) return isPm ? 12 : 0;
  return isPm ? hour + 12 : hour;
};

const build = (
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number,
): ParsedTimestamp | null => {
  if (!isValidDate(year, month, day)) return null;
  if (hour < 0 || hour > 23 || minute > 59 || second > 59) return null;
  const date = `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
  return {
    iso: `${date}T${pad(hour)}:${pad(minute)}:${pad(second)}`,
    date,
    hour,
    dayOfWeek: isoWeekday(year, month, day),
  };
};

const tryParse = (value: string): ParsedTimestamp | null => {
  const iso = ISO_PATTERN.exec(value);
  if (iso) {
    const [, year, month, day, hour, minute, second] = iso;
    return build(toInt(year), toInt(month), toInt(day), toInt(hour), toInt(minute), toInt(second));
  }

  const us = US_PATTERN.exec(value);
  if (us) {
    const [, month, day, year, hour, minute, second, meridiem] = us;
    const hour24 = to24Hour(toInt(hour), hour === undefined ? undefined : meridiem);
    if (hour24 === null) return null;
    return build(toInt(year), toInt(month), toInt(day), hour24, toInt(minute), toInt(second));
  }

  return null;
};

/**
 * Parses a transit timestamp as a wall-clock value. Any zone designator is
 * ignored so the hour matches what the source printed.
 */
export const parseTransitTimestamp = (value: string): ParsedTimestamp => {
  const parsed = tryParse(value.trim());
  if (!parsed) {
    throw new SchemaError(`Unparseable transit_timestamp value "${value}"`);
  }
  return parsed;
};

/** Parses a `YYYY-MM-DD` calendar date; returns null when it is not one. */
export const parseCalendarDate = (value: string): { date: string; dayOfWeek: number } | null => {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value.trim());
  if (!match) return null;
  const [, year, month, day] = match;
  const parsed = build(toInt(year), toInt(month), toInt(day), 0, 0, 0);
  return parsed ? { date: parsed.date, dayOfWeek: parsed.dayOfWeek } : null;
};
