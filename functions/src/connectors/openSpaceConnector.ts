import { fetchJson, isRecord } from './http';
import type { ProviderConnector } from './types';

interface OpenSpaceConnectorConfig {
  url: string;
  apiKey: string;
  timeoutMs?: number;
}

export interface OpenSpaceLot {
  location_name?: string | null;
  location_address?: string | null;
  geocode?: string | null;
  total_spaces?: number | string | null;
  free_spaces?: number | string | null;
  occupancy?: number | string | null;
  hidden?: boolean | string | null;
}

export class OpenSpaceConnector implements ProviderConnector<OpenSpaceLot[]> {
  readonly sourceId = 'openspace';
  private readonly config: OpenSpaceConnectorConfig;

  constructor(config: OpenSpaceConnectorConfig) {
    this.config = config;
  }

  /** Lots arrive nested one level deep: `[[lot, lot, ...]]`. */
  async fetch(): Promise<OpenSpaceLot[]> {
    const body = await fetchJson(this.sourceId, this.config.url, {
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': this.config.apiKey,
      },
      timeoutMs: this.config.timeoutMs ?? 10_000,
    });

    if (!Array.isArray(body) || body.length === 0) {
      return [];
    }

    const lots: unknown[] = Array.isArray(body[0]) ? body[0] : body;
    return lots.filter(isRecord) as OpenSpaceLot[];
  }
}
