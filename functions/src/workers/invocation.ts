import * as logger from 'firebase-functions/logger';
import { describeError } from '../utils/errors';

export type CampusDomain =
  | 'weather'
  | 'parking'
  | 'busyness'
  | 'calendarEvents'
  | 'organizationEvents'
  | 'emergencyAlerts';

export const CAMPUS_DOMAINS: readonly CampusDomain[] = [
  'weather',
  'parking',
  'busyness',
  'calendarEvents',
  'organizationEvents',
  'emergencyAlerts',
];

export function isCampusDomain(value: string): value is CampusDomain {
  return CAMPUS_DOMAINS.some(domain => domain === value);
}

export type Pipeline<S = unknown> = () => Promise<S>;

export type InvocationOutcome<S> =
  | { ok: true; domain: CampusDomain; durationMs: number; summary: S }
  | { ok: false; domain: CampusDomain; durationMs: number; error: unknown };

/**
 * Runs one pass of a domain pipeline and always settles normally: a failure
 * anywhere inside is logged and returned, never rethrown. The stored data
 * from the last good run stays in place until the next scheduled tick.
 */
export async function runContained<S>(domain: CampusDomain, pipeline: Pipeline<S>): Promise<InvocationOutcome<S>> {
  const startedAt = Date.now();
  try {
    const summary = await pipeline();
    const durationMs = Date.now() - startedAt;
    logger.info(`[${domain}] Sync complete`, { domain, durationMs, summary });
    return { ok: true, domain, durationMs, summary };
  } catch (error) {
    const durationMs = Date.now() - startedAt;
    logger.error(`[${domain}] Sync failed`, { domain, durationMs, error: describeError(error) });
    return { ok: false, domain, durationMs, error };
  }
}

/** Adapts a pipeline to a scheduled trigger. Ignores the payload; every run is acknowledged. */
export function scheduledHandler<S>(domain: CampusDomain, pipeline: Pipeline<S>): (trigger?: unknown) => Promise<null> {
  return async () => {
    await runContained(domain, pipeline);
    return null;
  };
}
