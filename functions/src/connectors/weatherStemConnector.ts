import { fetchJson, isRecord } from './http';
import type { ProviderConnector } from './types';

interface WeatherStemConnectorConfig {
  url: string;
  apiKey: string;
  station: string;
  timeoutMs?: number;
}

export interface WeatherStemReading {
  sensor?: string | null;
  sensor_type?: string | null;
  value?: string | number | null;
  unit?: string | null;
}

export interface WeatherStemCamera {
  name?: string | null;
  image?: string | null;
}

export interface WeatherStemStation {
  record?: {
    readings?: WeatherStemReading[] | null;
  } | null;
  station?: {
    name?: string | null;
    cameras?: WeatherStemCamera[] | null;
  } | null;
}

/**
 * The API answers with either a list of station objects or a single
 * station; anything else yields null.
 */
export class WeatherStemConnector implements ProviderConnector<WeatherStemStation | null> {
  readonly sourceId = 'weatherstem';
  private readonly config: WeatherStemConnectorConfig;

  constructor(config: WeatherStemConnectorConfig) {
    this.config = config;
  }

  async fetch(): Promise<WeatherStemStation | null> {
    const body = await fetchJson(this.sourceId, this.config.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        api_key: this.config.apiKey,
        stations: [this.config.station],
      }),
      timeoutMs: this.config.timeoutMs ?? 10_000,
    });

    if (Array.isArray(body) && body.length > 0 && isRecord(body[0])) {
      return body[0] as WeatherStemStation;
    }
    if (isRecord(body) && 'record' in body) {
      return body as WeatherStemStation;
    }
    return null;
  }
}
