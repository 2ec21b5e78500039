import { InvalidArgumentError } from "commander";

const DIGITS = /^\d+$/;

function parseWholeNumber(value: string, description: string): number {
  const trimmed = value.trim();
  if (!DIGITS.test(trimmed)) {
    throw new InvalidArgumentError(`Expected ${description}, got "${value}".`);
  }
  return parseInt(trimmed, 10);
}

/** Option parser for `--days`: a whole number of days, zero allowed. */
export function parseDaysOption(value: string): number {
  return parseWholeNumber(value, "a non-negative whole number of days");
}

/** Option parser for `--limit`: a positive whole number. */
export function parseLimitOption(value: string): number {
  const limit = parseWholeNumber(value, "a positive whole number");
  if (limit < 1) {
    throw new InvalidArgumentError(`Expected a positive whole number, got "${value}".`);
  }
  return limit;
}
