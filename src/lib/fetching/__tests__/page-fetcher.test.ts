/**
 * Page Fetcher Tests
 */

import { PageFetcher, createFetchBackend } from '../page-fetcher';
import { HttpFetchBackend } from '../http.fetcher';
import { FallbackFetchBackend } from '../fallback.fetcher';
import { createStubBackend } from '../../../__tests__/helpers/mocks';

describe('PageFetcher', () => {
  const url = 'https://verein.example.org/';

  it('should return a successful page result', async () => {
    const { backend } = createStubBackend({
      [url]: '<html><head><title>Start</title></head><body><a href="/a">A</a></body></html>',
    });
    const fetcher = new PageFetcher(backend, { timeout: 1000 });

    const result = await fetcher.fetchPage(url);

    expect(result.success).toBe(true);
    expect(result.url).toBe(url);
    expect(result.title).toBe('Start');
    expect(result.content).toBe('StartA');
    expect(result.links).toEqual(['/a']);
    expect(result.errorMessage).toBeUndefined();
    expect(Object.isFrozen(result)).toBe(true);
  });

  it('should map an HTTP error to a failed page without throwing', async () => {
    const { backend } = createStubBackend({ [url]: 500 });
    const fetcher = new PageFetcher(backend, { timeout: 1000 });
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    const result = await fetcher.fetchPage(url);

    expect(result.success).toBe(false);
    expect(result.errorMessage).toBe('HTTP 500');
    expect(result.content).toBe('');
    expect(result.links).toEqual([]);
    warn.mockRestore();
  });
});

describe('createFetchBackend', () => {
  it('should use plain HTTP when the renderer is disabled', () => {
    expect(createFetchBackend(false)).toBeInstanceOf(HttpFetchBackend);
  });

  it('should chain the renderer before HTTP when enabled', () => {
    const backend = createFetchBackend(true);
    expect(backend).toBeInstanceOf(FallbackFetchBackend);
    expect(backend.name).toBe('jina->http');
  });
});
