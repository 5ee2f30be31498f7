export type TemperatureUnit = 'fahrenheit' | 'celsius';

/**
 * One location's JSON object from the Open-Meteo forecast API, unparsed
 */
export type RawForecastPayload = Record<string, unknown>;

/**
 * Normalized forecast for a single zip code
 */
export interface WeatherRecord {
  zipCode: string;
  dailyMaxTemperature: number;
  unit: TemperatureUnit;
  date: string; // YYYY-MM-DD, in the location's own timezone
  currentTemperature: number | null;
  city?: string;
  state?: string;
  latitude?: number;
  longitude?: number;
}

export interface WeatherApiConfig {
  url: string;
  apiKey?: string;
  temperatureUnit: TemperatureUnit;
  batchSize: number;
  timeoutMs: number;
  retryCount: number;
  retryDelayMs: number;
  cacheTtlMs: number;
}

export interface ForecastCacheKey {
  originZip: string;
  radiusMiles: number;
  date: string;
  unit: TemperatureUnit;
}
