import {
  CoolestZipError,
  ERROR_CODES,
  ErrorCode,
} from '../common/errors';

export const EXIT_CODES = {
  OK: 0,
  FAILURE: 1,
  INPUT: 2,
  WEATHER_API: 3,
  NO_DATA: 4,
} as const;

const BY_ERROR_CODE: Record<ErrorCode, number> = {
  [ERROR_CODES.INVALID_INPUT]: EXIT_CODES.INPUT,
  [ERROR_CODES.UNKNOWN_ZIP]: EXIT_CODES.INPUT,
  [ERROR_CODES.DATASET]: EXIT_CODES.FAILURE,
  [ERROR_CODES.API_UNAVAILABLE]: EXIT_CODES.WEATHER_API,
  [ERROR_CODES.API_RATE_LIMIT]: EXIT_CODES.WEATHER_API,
  [ERROR_CODES.API_AUTH]: EXIT_CODES.WEATHER_API,
  [ERROR_CODES.NO_DATA]: EXIT_CODES.NO_DATA,
};

export function exitCodeFor(error: unknown): number {
  return error instanceof CoolestZipError ? BY_ERROR_CODE[error.code] : EXIT_CODES.FAILURE;
}

