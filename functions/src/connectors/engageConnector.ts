import * as logger from 'firebase-functions/logger';
import { addCivilDays, civilDateKey } from '../utils/timezone';
import { describeError } from '../utils/errors';
import { fetchJson, isRecord } from './http';
import type { ProviderConnector } from './types';

interface EngageConnectorConfig {
  baseUrl: string;
  apiKey: string;
  timeZone: string;
  horizonDays: number;
  take?: number;
  timeoutMs?: number;
  now?: () => Date;
}

export interface EngageAddress {
  name?: string | null;
  address?: string | null;
  line1?: string | null;
  latitude?: string | number | null;
  longitude?: string | number | null;
}

export interface EngageEvent {
  id?: number | string | null;
  name?: string | null;
  description?: string | null;
  startsOn?: string | null;
  endsOn?: string | null;
  startDateTime?: string | null;
  endDateTime?: string | null;
  imageUrl?: string | null;
  theme?: string | null;
  categories?: Array<{ id?: number; name?: string | null }> | null;
  categoryNames?: string[] | null;
  benefits?: string[] | null;
  benefitNames?: string[] | null;
  submittedByOrganizationId?: number | string | null;
  organizationName?: string | null;
  address?: EngageAddress | null;
}

export interface EngageFetchResult {
  events: EngageEvent[];
  /** Organization id -> display name. */
  organizations: Record<string, string>;
}

export class EngageConnector implements ProviderConnector<EngageFetchResult> {
  readonly sourceId = 'engage';
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeZone: string;
  private readonly horizonDays: number;
  private readonly take: number;
  private readonly timeoutMs: number;
  private readonly now: () => Date;

  constructor(config: EngageConnectorConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.apiKey = config.apiKey;
    this.timeZone = config.timeZone;
    this.horizonDays = config.horizonDays;
    this.take = config.take ?? 100;
    this.timeoutMs = config.timeoutMs ?? 15_000;
    this.now = config.now ?? (() => new Date());
  }

  async fetch(): Promise<EngageFetchResult> {
    const events = await this.fetchEvents();
    const organizationIds = new Set<string>();
    for (const event of events) {
      if (event.organizationName) {
        continue;
      }
      const id = event.submittedByOrganizationId;
      if (id !== null && id !== undefined && String(id).length > 0) {
        organizationIds.add(String(id));
      }
    }

    const organizations = await this.fetchOrganizationNames(Array.from(organizationIds));
    return { events, organizations };
  }

  private async fetchEvents(): Promise<EngageEvent[]> {
    const today = civilDateKey(this.now(), this.timeZone);
    const search = new URLSearchParams({
      startsAfter: `${today}T00:00:00`,
      startsBefore: `${addCivilDays(today, this.horizonDays)}T00:00:00`,
      take: String(this.take),
    });

    const body = await fetchJson(this.sourceId, `${this.baseUrl}/events/event?${search.toString()}`, {
      headers: this.headers(),
      timeoutMs: this.timeoutMs,
    });

    if (!isRecord(body)) {
      return [];
    }
    if ('error' in body) {
      logger.error('Engage API returned an error payload', { domain: 'organizationEvents', error: body.error });
      return [];
    }

    return Array.isArray(body.items) ? (body.items.filter(isRecord) as EngageEvent[]) : [];
  }

  /** A failed lookup leaves the events unnamed. */
  private async fetchOrganizationNames(ids: string[]): Promise<Record<string, string>> {
    if (ids.length === 0) {
      return {};
    }

    const search = new URLSearchParams();
    for (const id of ids) {
      search.append('ids', id);
    }
    search.set('take', '500');

    try {
      const body = await fetchJson(this.sourceId, `${this.baseUrl}/organizations/organization?${search.toString()}`, {
        headers: this.headers(),
        timeoutMs: this.timeoutMs,
      });

      if (!isRecord(body) || 'error' in body || !Array.isArray(body.items)) {
        logger.warn('Engage organization lookup returned no items', { domain: 'organizationEvents' });
        return {};
      }

      const names: Record<string, string> = {};
      for (const item of body.items) {
        if (!isRecord(item) || item.id === undefined || item.id === null) {
          continue;
        }
        if (typeof item.name === 'string' && item.name.trim().length > 0) {
          names[String(item.id)] = item.name.trim();
        }
      }
      return names;
    } catch (error) {
      logger.warn('Failed to fetch Engage organization names', {
        domain: 'organizationEvents',
        error: describeError(error),
      });
      return {};
    }
  }

  private headers(): Record<string, string> {
    return { 'X-Engage-Api-Key': this.apiKey };
  }
}
