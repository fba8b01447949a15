/**
 * Fallback Fetcher
 * Tries the primary backend and falls back to the secondary one for the same URL
 */

import { errorMessage } from '../errors';
import type { FetchBackend, FetchOptions, RawPage } from './fetch.types';

export class FallbackFetchBackend implements FetchBackend {
  readonly name: string;

  constructor(
    private readonly primary: FetchBackend,
    private readonly fallback: FetchBackend
  ) {
    this.name = `${primary.name}->${fallback.name}`;
  }

  async fetch(url: string, options: FetchOptions): Promise<RawPage> {
    try {
      return await this.primary.fetch(url, options);
    } catch (error) {
      if (options.signal?.aborted) {
        throw error;
      }
      console.warn(
        `[Fetcher] ${this.primary.name} failed for ${url} (${errorMessage(error)}), falling back to ${this.fallback.name}`
      );
      return this.fallback.fetch(url, options);
    }
  }
}
