import { InvalidInputError } from '../common/errors';

/**
 * US zip code regex (5 digits only, no ZIP+4)
 */
const ZIP_REGEX = /^[0-9]{5}$/;

/**
 * Validate a US zip code
 *
 * @returns the trimmed zip code
 * @throws {InvalidInputError} If the value is not 5 digits
 */
export function validateZip(zip: string): string {
  const trimmed = zip.trim();

  if (!ZIP_REGEX.test(trimmed)) {
    throw new InvalidInputError(
      `Invalid zip code "${trimmed}". Please use a 5-digit US zip code.`,
    );
  }

  return trimmed;
}

/**
 * Parse and validate a radius in miles. Accepts numbers or numeric strings.
 *
 * @throws {InvalidInputError} If the radius is not a finite positive number
 */
export function validateRadius(radius: number | string): number {
  const value = Number(radius);

  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidInputError(
      `Invalid radius "${String(radius)}". Radius must be a positive number of miles.`,
    );
  }

  return value;
}
