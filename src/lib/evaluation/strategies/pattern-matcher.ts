/**
 * Pattern Matcher
 * Heuristic text, URL and logo matching against one page. Pure and synchronous.
 */

import type { PageResult } from '../../fetching';
import type { EvidenceMatch } from '../evaluation.types';

const TEXT_BASE_CONFIDENCE = 0.3;
const TEXT_CONFIDENCE_PER_MATCH = 0.2;
const TEXT_MAX_CONFIDENCE = 0.9;
const CONTEXT_WINDOW = 50;

const PAGE_URL_CONFIDENCE = 0.8;
const LINK_CONFIDENCE = 0.7;
const LOGO_CONFIDENCE = 0.6;

export interface PatternMatcherOptions {
  caseSensitive: boolean;
}

export class PatternMatcher {
  constructor(private readonly options: PatternMatcherOptions = { caseSensitive: false }) {}

  /**
   * Match one pattern type against a page
   */
  match(patternType: string, patterns: readonly string[], page: PageResult): EvidenceMatch | null {
    switch (patternType) {
      case 'text':
        return this.matchText(patterns, page);
      case 'url':
        return this.matchUrl(patterns, page);
      case 'logo':
        return this.matchLogo(patterns, page);
      default:
        console.warn(`[Evaluator] Unknown pattern type: ${patternType}`);
        return null;
    }
  }

  matchText(patterns: readonly string[], page: PageResult): EvidenceMatch | null {
    if (!page.content) {
      return null;
    }

    const content = this.fold(page.content);
    const matches: Array<{ pattern: string; context: string }> = [];

    for (const pattern of this.searchable(patterns)) {
      const index = content.indexOf(pattern.search);
      if (index === -1) {
        continue;
      }
      const start = Math.max(0, index - CONTEXT_WINDOW);
      const end = Math.min(content.length, index + pattern.search.length + CONTEXT_WINDOW);
      matches.push({ pattern: pattern.original, context: content.substring(start, end).trim() });
    }

    if (matches.length === 0) {
      return null;
    }

    return {
      confidence: Math.min(TEXT_MAX_CONFIDENCE, TEXT_BASE_CONFIDENCE + matches.length * TEXT_CONFIDENCE_PER_MATCH),
      patternType: 'text',
      evidence: `'${matches[0].pattern}' found in context: ${matches[0].context}`,
      sourceUrl: page.url,
    };
  }

  matchUrl(patterns: readonly string[], page: PageResult): EvidenceMatch | null {
    const searchable = this.searchable(patterns);
    const pageUrl = this.fold(page.url);

    for (const pattern of searchable) {
      if (pageUrl.includes(pattern.search)) {
        return {
          confidence: PAGE_URL_CONFIDENCE,
          patternType: 'url',
          evidence: `URL contains '${pattern.original}': ${page.url}`,
          sourceUrl: page.url,
        };
      }
    }

    for (const link of page.links) {
      const folded = this.fold(link);
      for (const pattern of searchable) {
        if (folded.includes(pattern.search)) {
          return {
            confidence: LINK_CONFIDENCE,
            patternType: 'url',
            evidence: `Link contains '${pattern.original}': ${link}`,
            sourceUrl: page.url,
          };
        }
      }
    }

    return null;
  }

  matchLogo(patterns: readonly string[], page: PageResult): EvidenceMatch | null {
    if (!page.content) {
      return null;
    }

    const content = this.fold(page.content);

    for (const pattern of this.searchable(patterns)) {
      const p = pattern.search;
      const indicators = [`alt="${p}"`, `alt='${p}'`, `${p}.png`, `${p}.jpg`, `${p}.svg`, `logo/${p}`, `images/${p}`];
      const indicator = indicators.find((candidate) => content.includes(candidate));
      if (indicator) {
        return {
          confidence: LOGO_CONFIDENCE,
          patternType: 'logo',
          evidence: `Logo pattern '${pattern.original}' found: ${indicator}`,
          sourceUrl: page.url,
        };
      }
    }

    return null;
  }

  private fold(value: string): string {
    return this.options.caseSensitive ? value : value.toLowerCase();
  }

  private searchable(patterns: readonly string[]): Array<{ original: string; search: string }> {
    return patterns.filter((pattern) => pattern.length > 0).map((pattern) => ({ original: pattern, search: this.fold(pattern) }));
  }
}
