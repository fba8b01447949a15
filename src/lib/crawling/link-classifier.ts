/**
 * Link Classifier
 * Resolves raw hrefs and keeps same-site content pages
 */

const EXCLUDED_PATTERNS: RegExp[] = [
  /\.(pdf|doc|docx|xls|xlsx|zip|rar|tar|gz|jpg|jpeg|png|gif|svg|mp3|mp4|avi|mov)$/,
  /\/login/,
  /\/admin/,
  /\/wp-admin/,
  /\/user/,
  /mailto:/,
  /tel:/,
  /javascript:/,
  /#/,
  /\/feed/,
  /\/rss/,
  /\.xml$/,
];

/**
 * scheme://host/path, without query string or fragment
 */
export function canonicalUrl(url: URL): string {
  return `${url.protocol}//${url.host}${url.pathname}`;
}

/**
 * Check if URL should be excluded from crawling
 */
export function isExcludedUrl(url: string): boolean {
  const lower = url.toLowerCase();
  return EXCLUDED_PATTERNS.some((pattern) => pattern.test(lower));
}

/**
 * Extract internal content links, deduplicated in first-seen order
 */
export function classifyLinks(baseUrl: string, links: readonly string[]): string[] {
  let base: URL;
  try {
    base = new URL(baseUrl);
  } catch {
    return [];
  }

  const excludedBase = new Set([baseUrl, canonicalUrl(base)]);
  const internal = new Set<string>();

  for (const link of links) {
    let resolved: URL;
    try {
      resolved = new URL(link, base);
    } catch {
      continue;
    }

    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') {
      continue;
    }
    if (resolved.host !== base.host) {
      continue;
    }

    const clean = canonicalUrl(resolved);
    if (isExcludedUrl(clean) || excludedBase.has(clean)) {
      continue;
    }

    internal.add(clean);
  }

  return Array.from(internal);
}
