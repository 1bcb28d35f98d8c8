export interface OpenMeteoGeocodingResponse {
  results?: {
    name?: string;
    latitude: number;
    longitude: number;
    country_code?: string;
  }[];
}

export interface OpenMeteoDailyResponse {
  daily?: {
    time: string[];
    temperature_2m_max: (number | null)[];
    temperature_2m_min: (number | null)[];
    weathercode: (number | null)[];
    precipitation_probability_max: (number | null)[];
    windspeed_10m_max: (number | null)[];
  };
  error?: boolean;
  reason?: string;
}

/** One day of the provider's forecast, still in Celsius and km/h. */
export interface RawForecastDay {
  date: string;
  tempMaxC: number;
  tempMinC: number;
  weatherCode: number;
  precipitationChance: number;
  windSpeedKmh: number;
}
