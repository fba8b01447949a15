/**
 * Robots.txt Tests
 */

import { checkRobotsTxt, extractCrawlDelay } from '../robots';

describe('extractCrawlDelay', () => {
  it('should read the first Crawl-delay line', () => {
    expect(extractCrawlDelay('User-agent: *\nCrawl-Delay: 2.5\nDisallow: /admin')).toBe(2.5);
  });

  it('should be null without a Crawl-delay line or with an invalid value', () => {
    expect(extractCrawlDelay('User-agent: *\nDisallow:')).toBeNull();
    expect(extractCrawlDelay('Crawl-delay: soon')).toBeNull();
  });
});

describe('checkRobotsTxt', () => {
  let fetchMock: jest.SpyInstance;

  beforeEach(() => {
    fetchMock = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchMock.mockRestore();
  });

  it('should return content and crawl delay when robots.txt exists', async () => {
    fetchMock.mockResolvedValue(new Response('User-agent: *\nCrawl-delay: 3', { status: 200 }));

    await expect(checkRobotsTxt('https://verein.example.org/projekte')).resolves.toEqual({
      exists: true,
      content: 'User-agent: *\nCrawl-delay: 3',
      crawlDelay: 3,
    });
    expect(fetchMock.mock.calls[0][0]).toBe('https://verein.example.org/robots.txt');
  });

  it('should report a missing robots.txt without throwing', async () => {
    fetchMock.mockResolvedValue(new Response('not found', { status: 404 }));
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    await expect(checkRobotsTxt('https://verein.example.org/')).resolves.toEqual({
      exists: false,
      content: '',
      crawlDelay: null,
    });
    warn.mockRestore();
  });
});
