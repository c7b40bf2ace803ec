import { InvalidInputError } from "../errors";

export const FIRST_ARCHIVED_YEAR = 2006;

/**
 * Checks a year argument and returns it in the form the archive's tabs use.
 * Accepts integers within [2006, current year]; surrounding whitespace and a
 * leading sign are tolerated, anything else is rejected.
 * @param value - Raw user input
 * @param now - Clock used to find the current year
 * @returns The bare four-digit year (e.g. " 2021" becomes "2021")
 * @throws InvalidInputError if the input is not an integer or out of range
 */
export function validateYear(value: string, now: Date = new Date()): string {
  const currentYear = now.getFullYear();

  if (!/^\s*[+-]?\d+\s*$/.test(value)) {
    throw new InvalidInputError(`${value} is not a valid year.`, value);
  }

  const year = parseInt(value, 10);
  if (year < FIRST_ARCHIVED_YEAR || year > currentYear) {
    throw new InvalidInputError(
      `Year must be between ${FIRST_ARCHIVED_YEAR} and ${currentYear}.`,
      value
    );
  }

  return String(year);
}
