function assertValidDate(date: Date, name: string): void {
  if (Number.isNaN(date.getTime())) {
    throw new RangeError(`${name} is not a valid date`);
  }
}

/**
 * Next occurrence of a yearly anniversary relative to `now`.
 *
 * An anniversary that has not passed yet is returned unchanged. A past one is
 * moved to the year after `now`'s year (not the year after its own), keeping
 * month, day and time of day. Feb 29 rolls forward to Mar 1 in non-leap years.
 */
export function nextAnnualOccurrence(anniversary: Date, now: Date): Date {
  assertValidDate(anniversary, "anniversary");
  assertValidDate(now, "now");

  if (anniversary.getTime() >= now.getTime()) {
    return new Date(anniversary.getTime());
  }

  return new Date(
    now.getFullYear() + 1,
    anniversary.getMonth(),
    anniversary.getDate(),
    anniversary.getHours(),
    anniversary.getMinutes(),
    anniversary.getSeconds(),
    anniversary.getMilliseconds()
  );
}

/** Calendar-day subtraction; the time of day is kept across DST changes. */
export function subtractDays(date: Date, days: number): Date {
  assertValidDate(date, "date");
  if (!Number.isInteger(days) || days < 0) {
    throw new RangeError(`days must be a non-negative integer, got ${days}`);
  }

  const result = new Date(date.getTime());
  result.setDate(result.getDate() - days);
  return result;
}
