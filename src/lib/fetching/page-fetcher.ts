/**
 * Page Fetcher
 * Fetches a single URL and turns every outcome into a PageResult
 */

import { env } from '../../config/env';
import { errorMessage } from '../errors';
import { FallbackFetchBackend } from './fallback.fetcher';
import { HttpFetchBackend } from './http.fetcher';
import { JinaFetchBackend } from './jina.fetcher';
import { parseHtml } from './html-parser';
import type { FetchBackend, PageResult } from './fetch.types';

export interface PageFetcherOptions {
  timeout: number;
  headers?: Record<string, string>;
}

export function createPageResult(fields: {
  url: string;
  title: string;
  content: string;
  links: string[];
}): PageResult {
  return Object.freeze({
    url: fields.url,
    title: fields.title,
    content: fields.content,
    links: Object.freeze([...fields.links]),
    success: true,
    fetchedAt: new Date(),
  });
}

export function createFailedPage(url: string, error: string): PageResult {
  return Object.freeze({
    url,
    title: '',
    content: '',
    links: Object.freeze([]),
    success: false,
    errorMessage: error,
    fetchedAt: new Date(),
  });
}

export class PageFetcher {
  constructor(
    private readonly backend: FetchBackend,
    private readonly options: PageFetcherOptions = { timeout: env.REQUEST_TIMEOUT_MS }
  ) {}

  get backendName(): string {
    return this.backend.name;
  }

  /**
   * Fetch and parse a page. Never throws.
   */
  async fetchPage(url: string, signal?: AbortSignal): Promise<PageResult> {
    try {
      const raw = await this.backend.fetch(url, {
        timeout: this.options.timeout,
        headers: this.options.headers,
        signal,
      });
      const parsed = parseHtml(raw.html);

      return createPageResult({
        url,
        title: parsed.title,
        content: parsed.content,
        links: parsed.links,
      });
    } catch (error) {
      const message = errorMessage(error);
      console.warn(`[Fetcher] Failed to fetch ${url}: ${message}`);
      return createFailedPage(url, message);
    }
  }
}

/**
 * Backend chosen by configuration: Jina with HTTP fallback, or HTTP alone
 */
export function createFetchBackend(rendererEnabled: boolean = env.RENDERER_ENABLED): FetchBackend {
  const http = new HttpFetchBackend();
  if (!rendererEnabled) {
    return http;
  }
  return new FallbackFetchBackend(new JinaFetchBackend(), http);
}

export function createPageFetcher(options?: { rendererEnabled?: boolean; timeout?: number }): PageFetcher {
  return new PageFetcher(createFetchBackend(options?.rendererEnabled), {
    timeout: options?.timeout ?? env.REQUEST_TIMEOUT_MS,
  });
}
