/**
 * Fetching Types
 */

/**
 * Outcome of one fetch attempt. Failed pages carry no content and no links.
 */
export interface PageResult {
  readonly url: string;
  readonly title: string;
  readonly content: string;
  readonly links: readonly string[];
  readonly success: boolean;
  readonly errorMessage?: string;
  readonly fetchedAt: Date;
}

/**
 * Raw HTML returned by a fetch backend
 */
export interface RawPage {
  url: string;
  html: string;
  statusCode: number;
}

export interface FetchOptions {
  timeout: number;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

/**
 * A way of retrieving the HTML of a page. Implementations throw FetchError.
 */
export interface FetchBackend {
  readonly name: string;
  fetch(url: string, options: FetchOptions): Promise<RawPage>;
}

export interface ParsedPage {
  title: string;
  content: string;
  links: string[];
}
