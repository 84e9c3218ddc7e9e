import Parser from 'rss-parser';
import { UpstreamUnavailableError } from '../utils/errors';
import { fetchText } from './http';
import type { ProviderConnector } from './types';

interface AlertFeedConnectorConfig {
  feedUrl: string;
  timeoutMs?: number;
}

export interface AlertFeedItem {
  guid?: string;
  title?: string;
  link?: string;
  pubDate?: string;
  isoDate?: string;
  content?: string;
  contentSnippet?: string;
}

export class AlertFeedConnector implements ProviderConnector<AlertFeedItem[]> {
  readonly sourceId = 'alert-feed';
  private readonly config: AlertFeedConnectorConfig;
  private readonly parser: Parser;

  constructor(config: AlertFeedConnectorConfig) {
    this.config = config;
    this.parser = new Parser();
  }

  async fetch(): Promise<AlertFeedItem[]> {
    const xml = await fetchText(this.sourceId, this.config.feedUrl, {
      headers: {
        Accept: 'application/rss+xml, application/atom+xml, application/xml, text/xml',
      },
      timeoutMs: this.config.timeoutMs ?? 15_000,
    });

    return this.parse(xml);
  }

  async parse(xml: string): Promise<AlertFeedItem[]> {
    const feed = await this.parser.parseString(xml).catch((error: unknown) => {
      throw new UpstreamUnavailableError('Failed to parse alert feed', { feedUrl: this.config.feedUrl }, { cause: error });
    });

    return (feed.items ?? []).map(item => ({
      guid: item.guid,
      title: item.title,
      link: item.link,
      pubDate: item.pubDate,
      isoDate: item.isoDate,
      content: item.content,
      contentSnippet: item.contentSnippet,
    }));
  }
}
