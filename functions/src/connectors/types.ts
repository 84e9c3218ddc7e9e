/**
 * Reaches one upstream provider and returns its payload untouched.
 * Implementations make a single attempt; a failed run is retried by the
 * next scheduled invocation, never in-process.
 */
export interface ProviderConnector<T> {
  readonly sourceId: string;
  fetch(): Promise<T>;
}

export interface HttpRequestOptions {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string;
  timeoutMs: number;
}
