import { Repeater, RepeaterUnit, Timestamp } from "./types.js";

const DAY_NAMES = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];

const TIMESTAMP_PATTERN =
  /^([<[])(\d{4})-(\d{2})-(\d{2})(?:\s+[A-Za-z]{2,3}\.?)?(?:\s+(\d{1,2}):(\d{2}))?(?:\s+\+(\d+)([hdwmy]))?\s*([>\]])$/;

const DATE_STRING_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2}))?)?$/;

const YEARLESS_DATE_PATTERN = /^(?:--)?(\d{2})-(\d{2})$/;

/** Leap year, so a yearless Feb 29 is still a real date. */
export const YEARLESS_PLACEHOLDER_YEAR = 2000;

const REPEATER_PATTERN = /^\+?(\d+)([hdwmy])$/;

const REPEATER_UNITS: readonly RepeaterUnit[] = ["h", "d", "w", "m", "y"];

function isRepeaterUnit(value: string): value is RepeaterUnit {
  return REPEATER_UNITS.some((unit) => unit === value);
}

function pad(value: number, width: number = 2): string {
  return value.toString().padStart(width, "0");
}

/**
 * Builds a local date from calendar fields, or returns undefined when the
 * fields do not name a real calendar date (Feb 30, month 13, 25:00...).
 */
export function localDate(
  year: number,
  month: number,
  day: number,
  hours: number = 0,
  minutes: number = 0,
  seconds: number = 0
): Date | undefined {
  const date = new Date(2000, 0, 1, hours, minutes, seconds);
  // setFullYear keeps years below 100 literal (the Date constructor maps them to 19xx)
  date.setFullYear(year, month - 1, day);

  if (
    date.getFullYear() !== year ||
    date.getMonth() !== month - 1 ||
    date.getDate() !== day ||
    date.getHours() !== hours ||
    date.getMinutes() !== minutes ||
    date.getSeconds() !== seconds
  ) {
    return undefined;
  }
  return date;
}

export function hasTimeOfDay(date: Date): boolean {
  return date.getHours() !== 0 || date.getMinutes() !== 0;
}

export function formatDate(date: Date): string {
  return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function formatRepeater(repeater: Repeater): string {
  return `+${repeater.value}${repeater.unit}`;
}

export function parseRepeater(text: string): Repeater | undefined {
  const match = text.trim().match(REPEATER_PATTERN);
  if (!match) {
    return undefined;
  }
  const value = parseInt(match[1], 10);
  const unit = match[2];
  if (value < 1 || !isRepeaterUnit(unit)) {
    return undefined;
  }
  return { value, unit };
}

export function formatTimestamp(timestamp: Timestamp): string {
  const { date } = timestamp;
  const parts = [formatDate(date), DAY_NAMES[date.getDay()]];
  if (timestamp.hasTime) {
    parts.push(`${pad(date.getHours())}:${pad(date.getMinutes())}`);
  }
  if (timestamp.repeater) {
    parts.push(formatRepeater(timestamp.repeater));
  }
  const [open, close] = timestamp.active ? ["<", ">"] : ["[", "]"];
  return `${open}${parts.join(" ")}${close}`;
}

export function parseTimestamp(text: string): Timestamp | undefined {
  const match = text.trim().match(TIMESTAMP_PATTERN);
  if (!match) {
    return undefined;
  }

  const [, open, year, month, day, hours, minutes, repeatValue, repeatUnit, close] = match;
  const active = open === "<";
  if (active !== (close === ">")) {
    return undefined;
  }

  const hasTime = hours !== undefined;
  const date = localDate(
    parseInt(year, 10),
    parseInt(month, 10),
    parseInt(day, 10),
    hasTime ? parseInt(hours, 10) : 0,
    hasTime ? parseInt(minutes, 10) : 0
  );
  if (!date) {
    return undefined;
  }

  const timestamp: Timestamp = { date, hasTime, active };
  if (repeatValue !== undefined) {
    const repeater = parseRepeater(`+${repeatValue}${repeatUnit}`);
    if (!repeater) {
      return undefined;
    }
    timestamp.repeater = repeater;
  }
  return timestamp;
}

/**
 * Parses a date as written in a property value: `YYYY-MM-DD` with an
 * optional `HH:MM[:SS]` (space or `T` separated), or an outline timestamp.
 * Dates are local wall-clock dates.
 */
export function parseDateString(text: string): Date | undefined {
  const trimmed = text.trim();

  const match = trimmed.match(DATE_STRING_PATTERN);
  if (match) {
    const [, year, month, day, hours, minutes, seconds] = match;
    return localDate(
      parseInt(year, 10),
      parseInt(month, 10),
      parseInt(day, 10),
      hours ? parseInt(hours, 10) : 0,
      minutes ? parseInt(minutes, 10) : 0,
      seconds ? parseInt(seconds, 10) : 0
    );
  }

  return parseTimestamp(trimmed)?.date;
}

/**
 * Parses a month and day without a year (`MM-DD` or `--MM-DD`), placing it
 * in {@link YEARLESS_PLACEHOLDER_YEAR}.
 */
export function parseYearlessDate(text: string): Date | undefined {
  const match = text.trim().match(YEARLESS_DATE_PATTERN);
  if (!match) {
    return undefined;
  }
  return localDate(YEARLESS_PLACEHOLDER_YEAR, parseInt(match[1], 10), parseInt(match[2], 10));
}
