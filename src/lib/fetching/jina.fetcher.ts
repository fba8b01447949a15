/**
 * Jina Reader Fetcher - rendering tier
 * Jina renders the page (including client-side JavaScript) and returns its HTML
 */

import { env } from '../../config/env';
import { CrawlErrorType, FetchError } from '../errors';
import { fetchText } from './fetch-with-timeout';
import type { FetchBackend, FetchOptions, RawPage } from './fetch.types';

export class JinaFetchBackend implements FetchBackend {
  readonly name = 'jina';

  constructor(
    private readonly readerUrl: string = env.JINA_READER_URL,
    private readonly timeout: number = env.JINA_TIMEOUT
  ) {}

  async fetch(url: string, options: FetchOptions): Promise<RawPage> {
    const response = await fetchText(`${this.readerUrl}/${url}`, {
      timeout: Math.min(this.timeout, options.timeout),
      headers: {
        Accept: 'text/html',
        'User-Agent': env.USER_AGENT,
        'X-Return-Format': 'html',
        ...options.headers,
      },
      signal: options.signal,
    });

    if (!response.body.trim()) {
      throw new FetchError('Jina Reader returned empty content', CrawlErrorType.PARSE_ERROR);
    }

    return { url, html: response.body, statusCode: response.status };
  }
}
