/**
 * Robots.txt lookup
 * Advisory only: a failed lookup never blocks crawling
 */

import { env } from '../../config/env';
import { errorMessage } from '../errors';
import { fetchText } from '../fetching';
import type { RobotsInfo } from './crawling.types';

const ROBOTS_TIMEOUT = 10000;

/**
 * Crawl-delay value in seconds, if present
 */
export function extractCrawlDelay(content: string): number | null {
  for (const rawLine of content.split('\n')) {
    const line = rawLine.trim().toLowerCase();
    if (line.startsWith('crawl-delay:')) {
      const delay = parseFloat(line.split(':', 2)[1].trim());
      return Number.isFinite(delay) ? delay : null;
    }
  }
  return null;
}

export async function checkRobotsTxt(baseUrl: string, signal?: AbortSignal): Promise<RobotsInfo> {
  try {
    const robotsUrl = new URL('/robots.txt', baseUrl).href;
    const response = await fetchText(robotsUrl, {
      timeout: ROBOTS_TIMEOUT,
      headers: { 'User-Agent': env.USER_AGENT },
      signal,
    });
    return { exists: true, content: response.body, crawlDelay: extractCrawlDelay(response.body) };
  } catch (error) {
    console.warn(`[Crawler] Could not check robots.txt for ${baseUrl}: ${errorMessage(error)}`);
    return { exists: false, content: '', crawlDelay: null };
  }
}
