import { UpstreamUnavailableError } from '../utils/errors';
import type { HttpRequestOptions } from './types';

const USER_AGENT = 'CampusFeeds/1.0';

export async function fetchText(sourceId: string, url: string, options: HttpRequestOptions): Promise<string> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: options.method ?? 'GET',
      headers: {
        'User-Agent': USER_AGENT,
        ...options.headers,
      },
      body: options.body,
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (error) {
    throw new UpstreamUnavailableError(`Request to ${sourceId} failed`, { url }, { cause: error });
  }

  if (!response.ok) {
    const body = await response.text().catch(() => '');
    throw new UpstreamUnavailableError(`${sourceId} responded with status ${response.status}`, {
      url,
      status: response.status,
      body: body.slice(0, 500),
    });
  }

  try {
    return await response.text();
  } catch (error) {
    throw new UpstreamUnavailableError(`Failed to read ${sourceId} response body`, { url }, { cause: error });
  }
}

export async function fetchJson(sourceId: string, url: string, options: HttpRequestOptions): Promise<unknown> {
  const text = await fetchText(sourceId, url, {
    ...options,
    headers: { Accept: 'application/json', ...options.headers },
  });

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new UpstreamUnavailableError(`${sourceId} returned invalid JSON`, {
      url,
      body: text.slice(0, 500),
    }, { cause: error });
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
