/**
 * Readable names for page URLs
 */

const EXTENSION_PATTERN = /\.(html?|php|asp|jsp)$/i;
const MAX_PAGE_NAME_LENGTH = 30;

function lastPathSegment(url: string): string | null {
  const path = new URL(url).pathname.replace(/^\/+|\/+$/g, '');
  if (!path) {
    return null;
  }
  const parts = path.split('/').filter(Boolean);
  return parts[parts.length - 1];
}

function toTitleCase(value: string): string {
  return value.toLowerCase().replace(/(^|[^\p{L}])(\p{L})/gu, (_, prefix: string, letter: string) => {
    return prefix + letter.toUpperCase();
  });
}

function cleanSegment(segment: string): string {
  return decodeSegment(segment).replace(EXTENSION_PATTERN, '').replace(/[-_]/g, ' ');
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * Title derived from the last path segment, "Startseite" for the root
 */
export function titleFromUrl(url: string): string {
  try {
    const segment = lastPathSegment(url);
    return segment === null ? 'Startseite' : toTitleCase(cleanSegment(segment));
  } catch {
    return 'Unbekannte Seite';
  }
}

/**
 * Short page name for progress messages
 */
export function pageName(url: string): string {
  try {
    const segment = lastPathSegment(url);
    if (segment === null) {
      return 'Startseite';
    }
    let name = cleanSegment(segment);
    if (name.length > MAX_PAGE_NAME_LENGTH) {
      name = `${name.substring(0, 27)}...`;
    }
    return toTitleCase(name);
  } catch {
    return 'Unbekannte Seite';
  }
}
