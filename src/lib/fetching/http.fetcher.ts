/**
 * HTTP Fetcher - default tier
 * Plain GET with native fetch, no rendering
 */

import { env } from '../../config/env';
import { fetchText } from './fetch-with-timeout';
import type { FetchBackend, FetchOptions, RawPage } from './fetch.types';

export const DEFAULT_HEADERS: Record<string, string> = {
  'User-Agent': env.USER_AGENT,
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'de-DE,de;q=0.9,en;q=0.8',
};

export class HttpFetchBackend implements FetchBackend {
  readonly name = 'http';

  async fetch(url: string, options: FetchOptions): Promise<RawPage> {
    const response = await fetchText(url, {
      timeout: options.timeout,
      headers: { ...DEFAULT_HEADERS, ...options.headers },
      signal: options.signal,
    });

    return { url: response.url, html: response.body, statusCode: response.status };
  }
}
