export const WEATHER_API_CONFIG = Symbol('WEATHER_API_CONFIG');
export const FORECAST_CACHE = Symbol('FORECAST_CACHE');

// Open-Meteo's limit on coordinates per request
export const MAX_LOCATIONS_PER_REQUEST = 1000;
