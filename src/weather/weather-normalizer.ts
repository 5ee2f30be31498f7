import { Inject, Injectable } from '@nestjs/common';
import { z } from 'zod';
import { ZipLocation } from '../zipcode/interfaces/zipcode.interface';
import {
  RawForecastPayload,
  TemperatureUnit,
  WeatherApiConfig,
  WeatherRecord,
} from './interfaces/weather.interface';
import { WEATHER_API_CONFIG } from './weather.constants';

const ForecastPayloadSchema = z.object({
  latitude: z.number().optional(),
  longitude: z.number().optional(),
  current: z
    .object({
      temperature_2m: z.number().nullable().optional(),
    })
    .optional(),
  daily: z.object({
    time: z.array(z.string()).min(1),
    temperature_2m_max: z.array(z.number().nullable()).min(1),
  }),
  daily_units: z
    .object({
      temperature_2m_max: z.string().optional(),
    })
    .optional(),
});

const UNIT_SYMBOLS: Record<string, TemperatureUnit> = {
  '°F': 'fahrenheit',
  '°C': 'celsius',
};

@Injectable()
export class WeatherNormalizer {
  constructor(@Inject(WEATHER_API_CONFIG) private readonly config: WeatherApiConfig) {}

  /**
   * Turn one location's payload into a record for the first forecast day.
   * Returns null when there is no usable daily maximum, so a missing value
   * can never pass for the coolest one.
   */
  normalize(
    zipCode: string,
    payload: RawForecastPayload | undefined,
    place?: ZipLocation,
  ): WeatherRecord | null {
    const parsed = ForecastPayloadSchema.safeParse(payload);
    if (!parsed.success) return null;

    const { daily, current, daily_units: units } = parsed.data;
    const max = daily.temperature_2m_max[0];
    if (max === null || !Number.isFinite(max)) return null;

    const currentTemp = current?.temperature_2m;
    const unitSymbol = units?.temperature_2m_max;

    return {
      zipCode,
      dailyMaxTemperature: max,
      unit: (unitSymbol && UNIT_SYMBOLS[unitSymbol]) || this.config.temperatureUnit,
      date: daily.time[0],
      currentTemperature:
        typeof currentTemp === 'number' && Number.isFinite(currentTemp) ? currentTemp : null,
      city: place?.city,
      state: place?.state,
      latitude: parsed.data.latitude ?? place?.latitude,
      longitude: parsed.data.longitude ?? place?.longitude,
    };
  }
}
