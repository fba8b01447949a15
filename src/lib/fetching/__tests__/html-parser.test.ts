/**
 * HTML Parser Tests
 */

import { parseHtml } from '../html-parser';

describe('parseHtml', () => {
  const html = `
<html>
<head>
<title>Über uns</title>
<style>.a { color: red; }</style>
</head>
<body>
<h1>Hallo Welt</h1>
<a href="/impressum">Impressum</a>
<a href="">Leer</a>
<script>var x = 1;</script>
<p>Unser   Jahresbericht</p>
</body>
</html>
`;

  it('should extract the title', () => {
    expect(parseHtml(html).title).toBe('Über uns');
  });

  it('should collect non-empty hrefs in document order', () => {
    expect(parseHtml(html).links).toEqual(['/impressum']);
  });

  it('should drop script and style text and collapse whitespace', () => {
    expect(parseHtml(html).content).toBe('Über uns Hallo Welt Impressum Leer Unser Jahresbericht');
  });

  it('should return empty fields for an empty document', () => {
    expect(parseHtml('')).toEqual({ title: '', content: '', links: [] });
  });
});
