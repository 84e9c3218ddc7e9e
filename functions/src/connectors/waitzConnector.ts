import { fetchJson, isRecord } from './http';
import type { ProviderConnector } from './types';

interface WaitzConnectorConfig {
  url: string;
  timeoutMs?: number;
}

export interface WaitzSubLocation {
  id?: number | string | null;
  name?: string | null;
  busyness?: number | string | null;
  capacity?: number | string | null;
  isOpen?: boolean | null;
}

export interface WaitzLocation extends WaitzSubLocation {
  subLocs?: WaitzSubLocation[] | null;
  bestLocations?: Array<{ id?: number | string | null }> | null;
}

export class WaitzConnector implements ProviderConnector<WaitzLocation[]> {
  readonly sourceId = 'waitz';
  private readonly config: WaitzConnectorConfig;

  constructor(config: WaitzConnectorConfig) {
    this.config = config;
  }

  async fetch(): Promise<WaitzLocation[]> {
    const body = await fetchJson(this.sourceId, this.config.url, {
      timeoutMs: this.config.timeoutMs ?? 10_000,
    });

    const locations: unknown = isRecord(body) ? body.data : body;
    if (!Array.isArray(locations)) {
      return [];
    }
    return locations.filter(isRecord) as WaitzLocation[];
  }
}
