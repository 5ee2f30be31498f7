export const ERROR_CODES = {
  INVALID_INPUT: 'INVALID_INPUT',
  UNKNOWN_ZIP: 'UNKNOWN_ZIP',
  DATASET: 'DATASET',
  API_UNAVAILABLE: 'API_UNAVAILABLE',
  API_RATE_LIMIT: 'API_RATE_LIMIT',
  API_AUTH: 'API_AUTH',
  NO_DATA: 'NO_DATA',
} as const;

export type ErrorCode = typeof ERROR_CODES[keyof typeof ERROR_CODES];

/**
 * Base class for every error the pipeline raises on purpose.
 * Anything else reaching the CLI is a bug.
 */
export class CoolestZipError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
  ) {
    super(message);
    this.name = 'CoolestZipError';
  }
}

/**
 * Malformed user input (zip format, radius, CLI flags)
 */
export class InvalidInputError extends CoolestZipError {
  constructor(message: string) {
    super(message, ERROR_CODES.INVALID_INPUT);
    this.name = 'InvalidInputError';
  }
}

/**
 * Well-formed zip code that the geolocation dataset does not know
 */
export class UnknownZipError extends CoolestZipError {
  constructor(public readonly zipCode: string) {
    super(`Unknown zip code: ${zipCode}`, ERROR_CODES.UNKNOWN_ZIP);
    this.name = 'UnknownZipError';
  }
}

/**
 * The zip geolocation file is missing or malformed
 */
export class DatasetError extends CoolestZipError {
  constructor(message: string) {
    super(message, ERROR_CODES.DATASET);
    this.name = 'DatasetError';
  }
}

/**
 * Weather provider failure. Use one of the subclasses.
 */
export class WeatherApiError extends CoolestZipError {
  constructor(
    message: string,
    code: ErrorCode,
    public readonly statusCode?: number,
  ) {
    super(message, code);
    this.name = 'WeatherApiError';
  }
}

export class ApiUnavailableError extends WeatherApiError {
  constructor(message: string, statusCode?: number) {
    super(message, ERROR_CODES.API_UNAVAILABLE, statusCode);
    this.name = 'ApiUnavailableError';
  }
}

export class ApiRateLimitError extends WeatherApiError {
  constructor(message: string, statusCode = 429) {
    super(message, ERROR_CODES.API_RATE_LIMIT, statusCode);
    this.name = 'ApiRateLimitError';
  }
}

export class ApiAuthError extends WeatherApiError {
  constructor(message: string, statusCode?: number) {
    super(message, ERROR_CODES.API_AUTH, statusCode);
    this.name = 'ApiAuthError';
  }
}

/**
 * No candidate zip code produced a usable forecast
 */
export class NoDataError extends CoolestZipError {
  constructor(message = 'No usable forecast data was returned for any zip code in range') {
    super(message, ERROR_CODES.NO_DATA);
    this.name = 'NoDataError';
  }
}
