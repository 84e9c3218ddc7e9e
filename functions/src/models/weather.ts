import type { TimestampString } from './location';

export interface WindReading {
  speed: number | null;
  gust: number | null;
  direction: string | null;
  degrees: number | null;
}

export interface RainReading {
  rate: number | null;
  total: number | null;
}

export interface WeatherSnapshot {
  temperature: number;
  feelsLike: number;
  humidity: number | null;
  wind: WindReading;
  uvIndex: number | null;
  rain: RainReading;
  solarRadiation: number | null;
  /** Unix seconds. */
  sunrise: number | null;
  sunset: number | null;
  imageUrl: string | null;
  lastUpdated: TimestampString;
}
