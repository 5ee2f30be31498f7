import { Inject, Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { isAxiosError } from 'axios';
import { firstValueFrom, retry, throwError, timer } from 'rxjs';
import { z } from 'zod';
import {
  ApiAuthError,
  ApiRateLimitError,
  ApiUnavailableError,
} from '../common/errors';
import { LocationCandidate } from '../zipcode/interfaces/zipcode.interface';
import { ForecastCache, ForecastPayloads } from './forecast-cache';
import {
  ForecastCacheKey,
  RawForecastPayload,
  WeatherApiConfig,
} from './interfaces/weather.interface';
import {
  FORECAST_CACHE,
  MAX_LOCATIONS_PER_REQUEST,
  WEATHER_API_CONFIG,
} from './weather.constants';

const ProviderErrorSchema = z.object({ reason: z.string() });

const isPayloadObject = (value: unknown): value is RawForecastPayload =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Network failures and 5xx are worth another attempt; anything else is final.
 */
function isTransient(error: unknown): boolean {
  if (!isAxiosError(error)) return false;
  return !error.response || error.response.status >= 500;
}

function chunk<T>(items: T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

@Injectable()
export class WeatherService {
  private readonly logger = new Logger(WeatherService.name);
  private readonly batchSize: number;

  constructor(
    private readonly httpService: HttpService,
    @Inject(WEATHER_API_CONFIG) private readonly config: WeatherApiConfig,
    @Inject(FORECAST_CACHE) private readonly cache: ForecastCache,
  ) {
    this.batchSize = Math.max(1, Math.min(config.batchSize, MAX_LOCATIONS_PER_REQUEST));
  }

  /**
   * Fetch today's forecast for every candidate, in batches of at most
   * `batchSize` coordinates. Zips the provider returns nothing for are left out.
   *
   * When `cacheKey` is given, a cached result for that exact query is reused.
   *
   * @throws {ApiUnavailableError} On transport failure, timeout or server error
   * @throws {ApiRateLimitError} When the provider reports quota exhaustion
   * @throws {ApiAuthError} When the provider rejects the API key
   */
  async fetch(
    candidates: LocationCandidate[],
    cacheKey?: ForecastCacheKey,
  ): Promise<ForecastPayloads> {
    if (cacheKey) {
      const cached = this.cache.get(cacheKey);
      if (cached) {
        this.logger.log(
          `Using cached forecasts for ${cacheKey.originZip} (${cacheKey.radiusMiles} mi, ${cacheKey.date})`,
        );
        return cached;
      }
    }

    const unique = [...new Map(candidates.map((c) => [c.zipCode, c])).values()];
    const batches = chunk(unique, this.batchSize);
    const payloads: ForecastPayloads = new Map();

    for (const [index, batch] of batches.entries()) {
      this.logger.log(
        `Requesting forecast batch ${index + 1}/${batches.length} (${batch.length} locations)`,
      );
      const results = await this.fetchBatch(batch);
      for (const [zipCode, payload] of results) {
        payloads.set(zipCode, payload);
      }
    }

    if (cacheKey) {
      this.cache.set(cacheKey, payloads);
    }
    return payloads;
  }

  private async fetchBatch(batch: LocationCandidate[]): Promise<ForecastPayloads> {
    const params: Record<string, string | number> = {
      latitude: batch.map((c) => c.latitude).join(','),
      longitude: batch.map((c) => c.longitude).join(','),
      daily: 'temperature_2m_max',
      current: 'temperature_2m',
      temperature_unit: this.config.temperatureUnit,
      forecast_days: 1,
      timezone: 'auto',
    };
    if (this.config.apiKey) {
      params.apikey = this.config.apiKey;
    }

    let data: unknown;
    try {
      const response = await firstValueFrom(
        this.httpService
          .get<unknown>(this.config.url, { params, timeout: this.config.timeoutMs })
          .pipe(
            retry({
              count: this.config.retryCount,
              delay: (error: unknown, attempt: number) => {
                if (!isTransient(error)) {
                  return throwError(() => error);
                }
                const waitMs = this.config.retryDelayMs * 2 ** (attempt - 1);
                this.logger.warn(
                  `Weather API request failed (${this.describe(error)}), retry ${attempt}/${this.config.retryCount} in ${waitMs}ms`,
                );
                return timer(waitMs);
              },
            }),
          ),
      );
      data = response.data;
    } catch (error) {
      throw this.toApiError(error);
    }

    return this.matchLocations(batch, data);
  }

  /**
   * Several coordinates come back as an array in request order, tagged with
   * `location_id`; a single coordinate comes back as a bare object.
   */
  private matchLocations(batch: LocationCandidate[], data: unknown): ForecastPayloads {
    const elements: unknown[] = Array.isArray(data) ? data : [data];
    const matched: ForecastPayloads = new Map();

    elements.forEach((element, index) => {
      if (!isPayloadObject(element)) return;
      const position =
        typeof element.location_id === 'number' ? element.location_id : index;
      const candidate = position >= 0 ? batch.at(position) : undefined;
      if (!candidate) return;
      matched.set(candidate.zipCode, element);
    });

    const missing = batch.length - matched.size;
    if (missing > 0) {
      this.logger.warn(`Weather API returned no forecast for ${missing} of ${batch.length} locations`);
    }
    return matched;
  }

  private toApiError(error: unknown): Error {
    if (!isAxiosError(error)) {
      return error instanceof Error ? error : new ApiUnavailableError(String(error));
    }

    const status = error.response?.status;
    if (status === undefined) {
      return new ApiUnavailableError(`Weather API is unreachable: ${this.describe(error)}`);
    }

    const body = ProviderErrorSchema.safeParse(error.response?.data);
    const reason = body.success ? body.data.reason : error.message;

    if (status === 429) {
      return new ApiRateLimitError(`Weather API rate limit reached: ${reason}`, status);
    }
    if (status === 401 || status === 403) {
      return new ApiAuthError(`Weather API rejected the credentials (HTTP ${status}): ${reason}`, status);
    }
    return new ApiUnavailableError(`Weather API error (HTTP ${status}): ${reason}`, status);
  }

  private describe(error: unknown): string {
    if (isAxiosError(error)) {
      return error.response ? `HTTP ${error.response.status}` : (error.code ?? error.message);
    }
    return error instanceof Error ? error.message : String(error);
  }
}
