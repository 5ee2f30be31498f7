import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { AppEnv } from '../config/env.validation';
import { InMemoryForecastCache } from './forecast-cache';
import { WeatherApiConfig } from './interfaces/weather.interface';
import { WeatherNormalizer } from './weather-normalizer';
import { FORECAST_CACHE, WEATHER_API_CONFIG } from './weather.constants';
import { WeatherService } from './weather.service';

export function buildWeatherApiConfig(configService: ConfigService<AppEnv, true>): WeatherApiConfig {
  return {
    url: configService.get('WEATHER_API_URL', { infer: true }),
    apiKey: configService.get('WEATHER_API_KEY', { infer: true }),
    temperatureUnit: configService.get('WEATHER_TEMPERATURE_UNIT', { infer: true }),
    batchSize: configService.get('WEATHER_BATCH_SIZE', { infer: true }),
    timeoutMs: configService.get('WEATHER_TIMEOUT_MS', { infer: true }),
    retryCount: configService.get('WEATHER_RETRY_COUNT', { infer: true }),
    retryDelayMs: configService.get('WEATHER_RETRY_DELAY_MS', { infer: true }),
    cacheTtlMs: configService.get('WEATHER_CACHE_TTL_SECONDS', { infer: true }) * 1000,
  };
}

@Module({
  imports: [HttpModule],
  providers: [
    {
      provide: WEATHER_API_CONFIG,
      useFactory: buildWeatherApiConfig,
      inject: [ConfigService],
    },
    {
      provide: FORECAST_CACHE,
      useFactory: (config: WeatherApiConfig) => new InMemoryForecastCache(config.cacheTtlMs),
      inject: [WEATHER_API_CONFIG],
    },
    WeatherService,
    WeatherNormalizer,
  ],
  exports: [WeatherService, WeatherNormalizer, WEATHER_API_CONFIG],
})
export class WeatherModule {}
