/**
 * Test Fixtures
 * Reusable test data
 */

import { createFailedPage, createPageResult } from '../../lib/fetching';
import type { PageResult } from '../../lib/fetching';
import type { CriterionDefinition } from '../../lib/evaluation';

export const BASE_URL = 'https://verein.example.org/';

export const homepageHtml = `
<html>
<head><title>Musterverein e.V.</title></head>
<body>
<h1>Willkommen beim Musterverein</h1>
<a href="/ueber-uns">Über uns</a>
<a href="/transparenz">Transparenz</a>
<a href="/jahresbericht-2023.pdf">Jahresbericht PDF</a>
<a href="https://extern.example.com/partner">Partner</a>
<a href="/kontakt#formular">Kontakt</a>
</body>
</html>
`;

export function page(
  url: string,
  content: string,
  links: string[] = [],
  title: string = 'Seite'
): PageResult {
  return createPageResult({ url, title, content, links });
}

export function failedPage(url: string, error: string = 'HTTP 500'): PageResult {
  return createFailedPage(url, error);
}

export function criterion(overrides: Partial<CriterionDefinition> = {}): CriterionDefinition {
  return {
    id: 'transparenz_finanzen_jahresbericht',
    dimension: 'Transparenz',
    factor: 'Finanzen',
    name: 'Jahresbericht',
    description: 'Die Organisation veröffentlicht einen Jahresbericht',
    type: 'operational',
    patterns: { text: ['jahresbericht'] },
    weight: 1,
    ...overrides,
  };
}
