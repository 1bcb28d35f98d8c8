import type { ForecastRecord } from '../../../types/index.js';
import type { OpenMeteoDailyResponse, RawForecastDay } from './open-meteo-types.js';

/** WMO weather interpretation codes used by Open-Meteo. */
export const WMO_CODES: Record<number, string> = {
  0: 'Clear sky', 1: 'Mainly clear', 2: 'Partly cloudy', 3: 'Overcast',
  45: 'Fog', 48: 'Rime fog',
  51: 'Light drizzle', 53: 'Moderate drizzle', 55: 'Dense drizzle',
  61: 'Slight rain', 63: 'Moderate rain', 65: 'Heavy rain',
  71: 'Slight snow', 73: 'Moderate snow', 75: 'Heavy snow',
  80: 'Slight showers', 81: 'Moderate showers', 82: 'Violent showers',
  95: 'Thunderstorm', 96: 'Thunderstorm with hail', 99: 'Thunderstorm with heavy hail',
};

export const BAD_WEATHER_CODES: ReadonlySet<number> = new Set([
  45, 48, 51, 53, 55, 61, 63, 65, 71, 73, 75, 80, 81, 82, 95, 96, 99,
]);

export const MAX_PRECIPITATION_CHANCE = 50;
export const MAX_WIND_MPH = 25;

export function celsiusToFahrenheit(c: number): number {
  return Math.round((c * 9 / 5 + 32) * 10) / 10;
}

export function kmhToMph(kmh: number): number {
  return Math.round(kmh * 0.621371 * 10) / 10;
}

export function isSuitableOutdoor(weatherCode: number, precipitationChance: number, windSpeedMph: number): boolean {
  return !BAD_WEATHER_CODES.has(weatherCode)
    && precipitationChance < MAX_PRECIPITATION_CHANCE
    && windSpeedMph < MAX_WIND_MPH;
}

export function normalizeForecastDay(raw: RawForecastDay): ForecastRecord {
  const windSpeedMph = kmhToMph(raw.windSpeedKmh);
  return {
    date: raw.date,
    tempMinF: celsiusToFahrenheit(raw.tempMinC),
    tempMaxF: celsiusToFahrenheit(raw.tempMaxC),
    description: WMO_CODES[raw.weatherCode] ?? 'Unknown',
    precipitationChance: raw.precipitationChance,
    windSpeedMph,
    isSuitableOutdoor: isSuitableOutdoor(raw.weatherCode, raw.precipitationChance, windSpeedMph),
  };
}

/** Unzip Open-Meteo's column-oriented `daily` block into one row per day. Nulls become 0. */
export function toRawForecastDays(daily: NonNullable<OpenMeteoDailyResponse['daily']>): RawForecastDay[] {
  return daily.time.map((date, i) => ({
    date,
    tempMaxC: daily.temperature_2m_max[i] ?? 0,
    tempMinC: daily.temperature_2m_min[i] ?? 0,
    weatherCode: daily.weathercode[i] ?? 0,
    precipitationChance: daily.precipitation_probability_max[i] ?? 0,
    windSpeedKmh: daily.windspeed_10m_max[i] ?? 0,
  }));
}
