import type { AlertFeedItem } from '../connectors/alertFeedConnector';
import type { AlertRecord } from '../models/alert';
import { MalformedUpstreamDataError } from '../utils/errors';
import { toPlainText } from '../utils/html';
import { parseProviderTimestamp, toZonedIsoString } from '../utils/timezone';
import { readString } from './fields';

export interface NormalizedAlert {
  /** guid, else link, else `title|pubDate`. */
  identity: string;
  record: AlertRecord;
}

/**
 * Picks the most recent item of the feed: the latest publication date, or
 * the first item when no item is dated. Returns null for an empty feed.
 */
export function normalizeLatestAlert(items: AlertFeedItem[], timeZone: string): NormalizedAlert | null {
  if (items.length === 0) {
    return null;
  }

  let latest = items[0];
  let latestTime = publishedAt(latest)?.getTime() ?? Number.NEGATIVE_INFINITY;
  for (const item of items.slice(1)) {
    const time = publishedAt(item)?.getTime() ?? Number.NEGATIVE_INFINITY;
    if (time > latestTime) {
      latest = item;
      latestTime = time;
    }
  }

  return latest ? normalizeAlertItem(latest, timeZone) : null;
}

export function normalizeAlertItem(item: AlertFeedItem, timeZone: string): NormalizedAlert {
  const title = readString(item.title);
  const link = readString(item.link);
  const guid = readString(item.guid);
  const published = publishedAt(item);
  const pubDate = published ? toZonedIsoString(published, timeZone) : null;

  if (!guid && !link && !title) {
    throw new MalformedUpstreamDataError('Alert feed item has no guid, link or title');
  }

  return {
    identity: guid ?? link ?? `${title ?? ''}|${pubDate ?? ''}`,
    record: {
      title: title ?? '',
      description: readString(item.contentSnippet) ?? toPlainText(item.content),
      link,
      pubDate,
    },
  };
}

function publishedAt(item: AlertFeedItem | undefined): Date | null {
  if (!item) {
    return null;
  }
  const iso = parseProviderTimestamp(item.isoDate);
  if (iso) {
    return iso;
  }
  const rfc822 = item.pubDate ? new Date(item.pubDate) : null;
  return rfc822 && !Number.isNaN(rfc822.getTime()) ? rfc822 : null;
}
