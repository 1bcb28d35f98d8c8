import { CollectionError, errorMessage } from '../../errors.js';
import type { DateRange, ForecastSource } from '../../types/collaborators.js';
import { fetchJson, type RetryOptions } from './utils/http.js';
import { toRawForecastDays } from './utils/forecast-mapper.js';
import type { OpenMeteoDailyResponse, OpenMeteoGeocodingResponse, RawForecastDay } from './utils/open-meteo-types.js';

const GEOCODING_URL = 'https://geocoding-api.open-meteo.com/v1/search';
const FORECAST_URL = 'https://api.open-meteo.com/v1/forecast';

/** Open-Meteo serves at most this many days of daily forecast, today included. */
export const FORECAST_HORIZON_DAYS = 16;

const DAILY_FIELDS = [
  'temperature_2m_max',
  'temperature_2m_min',
  'weathercode',
  'precipitation_probability_max',
  'windspeed_10m_max',
];

export interface OpenMeteoConfig {
  geocodingUrl?: string;
  forecastUrl?: string;
  http?: RetryOptions;
}

/**
 * Open-Meteo forecast client (no API key). Geocodes the city, then asks for
 * daily values in Celsius and km/h; conversion happens in the forecast mapper.
 */
export class OpenMeteoForecast implements ForecastSource {
  private readonly geocodingUrl: string;
  private readonly forecastUrl: string;
  private readonly http: RetryOptions;

  constructor(config: OpenMeteoConfig = {}) {
    this.geocodingUrl = config.geocodingUrl ?? GEOCODING_URL;
    this.forecastUrl = config.forecastUrl ?? FORECAST_URL;
    this.http = config.http ?? {};
  }

  async fetchDaily(city: string, range: DateRange): Promise<RawForecastDay[]> {
    const { latitude, longitude } = await this.geocode(city);

    const params = new URLSearchParams({
      latitude: String(latitude),
      longitude: String(longitude),
      daily: DAILY_FIELDS.join(','),
      start_date: range.start,
      end_date: range.end,
      timezone: 'auto',
      temperature_unit: 'celsius',
      windspeed_unit: 'kmh',
    });

    let data: OpenMeteoDailyResponse;
    try {
      data = await fetchJson<OpenMeteoDailyResponse>(`${this.forecastUrl}?${params.toString()}`, this.http);
    } catch (error) {
      throw new CollectionError('forecast', `Open-Meteo forecast failed: ${errorMessage(error)}`, { cause: error });
    }

    if (data.error || !data.daily) {
      throw new CollectionError('forecast', `Open-Meteo forecast failed: ${data.reason ?? 'no daily data'}`);
    }

    const days = toRawForecastDays(data.daily);
    console.log(`[open-meteo] ${days.length} days for ${city} (${range.start} → ${range.end})`);
    return days;
  }

  private async geocode(city: string): Promise<{ latitude: number; longitude: number }> {
    const params = new URLSearchParams({ name: city, count: '1', language: 'en', format: 'json' });

    let data: OpenMeteoGeocodingResponse;
    try {
      data = await fetchJson<OpenMeteoGeocodingResponse>(`${this.geocodingUrl}?${params.toString()}`, this.http);
    } catch (error) {
      throw new CollectionError('forecast', `Geocoding failed: ${errorMessage(error)}`, { cause: error });
    }

    const match = data.results?.[0];
    if (!match) {
      throw new CollectionError('forecast', `Cannot geocode city: "${city}"`);
    }
    return { latitude: match.latitude, longitude: match.longitude };
  }
}
