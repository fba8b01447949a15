/**
 * Fetching Module
 */

export * from './fetch.types';
export { PageFetcher, createPageFetcher, createFetchBackend, createPageResult, createFailedPage } from './page-fetcher';
export { HttpFetchBackend } from './http.fetcher';
export { JinaFetchBackend } from './jina.fetcher';
export { FallbackFetchBackend } from './fallback.fetcher';
export { parseHtml } from './html-parser';
export { fetchText } from './fetch-with-timeout';
