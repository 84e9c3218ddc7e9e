import { fetchJson, isRecord } from './http';
import type { ProviderConnector } from './types';

interface LocalistConnectorConfig {
  baseUrl: string;
  days: number;
  perPage?: number;
  maxPages?: number;
  timeoutMs?: number;
}

export interface LocalistEventInstance {
  id?: number;
  start?: string | null;
  end?: string | null;
  all_day?: boolean | null;
}

export interface LocalistEvent {
  id?: number | string | null;
  title?: string | null;
  description?: string | null;
  description_text?: string | null;
  location_name?: string | null;
  address?: string | null;
  geo?: {
    latitude?: string | number | null;
    longitude?: string | number | null;
  } | null;
  localist_url?: string | null;
  url?: string | null;
  photo_url?: string | null;
  event_instances?: Array<{ event_instance?: LocalistEventInstance | null }> | null;
  filters?: {
    event_types?: Array<{ id?: number; name?: string | null }> | null;
  } | null;
  departments?: Array<{ id?: number; name?: string | null }> | null;
}

export interface LocalistEventEnvelope {
  event?: LocalistEvent | null;
}

export class LocalistConnector implements ProviderConnector<LocalistEventEnvelope[]> {
  readonly sourceId = 'localist';
  private readonly baseUrl: string;
  private readonly days: number;
  private readonly perPage: number;
  private readonly maxPages: number;
  private readonly timeoutMs: number;

  constructor(config: LocalistConnectorConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.days = config.days;
    this.perPage = config.perPage ?? 100;
    this.maxPages = config.maxPages ?? 2;
    this.timeoutMs = config.timeoutMs ?? 15_000;
  }

  async fetch(): Promise<LocalistEventEnvelope[]> {
    const results: LocalistEventEnvelope[] = [];
    let page = 1;
    let totalPages = 1;

    do {
      const search = new URLSearchParams({
        days: String(this.days),
        pp: String(this.perPage),
      });
      if (page > 1) {
        search.set('page', String(page));
      }

      const body = await fetchJson(this.sourceId, `${this.baseUrl}?${search.toString()}`, {
        timeoutMs: this.timeoutMs,
      });

      if (!isRecord(body)) {
        break;
      }

      if (Array.isArray(body.events)) {
        results.push(...(body.events.filter(isRecord) as LocalistEventEnvelope[]));
      }

      const pageInfo = isRecord(body.page) ? body.page : {};
      totalPages = typeof pageInfo.total === 'number' ? Math.max(1, pageInfo.total) : 1;
      page += 1;
    } while (page <= Math.min(totalPages, this.maxPages));

    return results;
  }
}
