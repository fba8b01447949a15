/**
 * HTML Parser
 * Title, visible text and raw anchor hrefs via Cheerio
 */

import * as cheerio from 'cheerio';
import type { ParsedPage } from './fetch.types';

export function parseHtml(html: string): ParsedPage {
  const $ = cheerio.load(html);

  const title = $('title').first().text().trim();

  const links: string[] = [];
  $('a[href]').each((_, el) => {
    const href = $(el).attr('href')?.trim();
    if (href) {
      links.push(href);
    }
  });

  $('script, style').remove();
  const content = $.root().text().replace(/\s+/g, ' ').trim();

  return { title, content, links };
}
