import * as logger from 'firebase-functions/logger';
import { MalformedUpstreamDataError } from '../utils/errors';
import type { CampusDomain } from './invocation';

export interface NormalizedBatch<T> {
  records: T[];
  skipped: number;
}

/** Maps each raw record, dropping (and logging) the ones that cannot be identified. */
export function normalizeEach<TRaw, T>(
  domain: CampusDomain,
  items: readonly TRaw[],
  normalize: (raw: TRaw) => T,
): NormalizedBatch<T> {
  const records: T[] = [];
  let skipped = 0;

  for (const item of items) {
    try {
      records.push(normalize(item));
    } catch (error) {
      if (!(error instanceof MalformedUpstreamDataError)) {
        throw error;
      }
      skipped += 1;
      logger.warn(`[${domain}] Skipping malformed record: ${error.message}`, {
        domain,
        details: error.details,
      });
    }
  }

  return { records, skipped };
}
