/**
 * fetch() wrapper with a timeout and an optional caller abort signal
 */

import { CrawlErrorType, FetchError, classifyError, errorMessage } from '../errors';

export interface TextResponse {
  url: string;
  status: number;
  body: string;
}

const CHARSET_PATTERN = /charset\s*=\s*["']?([\w.:-]+)/i;
const META_SNIFF_BYTES = 1024;

/**
 * Charset from the Content-Type header, else from a <meta> tag near the top of the document
 */
export function detectCharset(bytes: Uint8Array, contentType: string | null): string {
  const fromHeader = contentType ? CHARSET_PATTERN.exec(contentType) : null;
  if (fromHeader) {
    return fromHeader[1].toLowerCase();
  }

  const head = new TextDecoder('latin1').decode(bytes.subarray(0, META_SNIFF_BYTES));
  const fromMeta = /<meta[^>]+charset\s*=\s*["']?([\w.:-]+)/i.exec(head);
  return fromMeta ? fromMeta[1].toLowerCase() : 'utf-8';
}

export function decodeBody(bytes: Uint8Array, contentType: string | null): string {
  const charset = detectCharset(bytes, contentType);
  try {
    return new TextDecoder(charset).decode(bytes);
  } catch (error) {
    console.warn(`[Crawler] Unsupported charset '${charset}', decoding as UTF-8: ${errorMessage(error)}`);
    return new TextDecoder('utf-8').decode(bytes);
  }
}

export async function fetchText(
  url: string,
  options: { timeout: number; headers?: Record<string, string>; signal?: AbortSignal }
): Promise<TextResponse> {
  const { timeout, headers, signal } = options;

  if (signal?.aborted) {
    throw new FetchError('Request aborted', CrawlErrorType.UNKNOWN);
  }

  const controller = new AbortController();
  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeout);
  const onAbort = () => controller.abort();
  signal?.addEventListener('abort', onAbort, { once: true });

  try {
    const response = await fetch(url, {
      method: 'GET',
      headers,
      redirect: 'follow',
      signal: controller.signal,
    });
    const body = decodeBody(new Uint8Array(await response.arrayBuffer()), response.headers.get('content-type'));

    if (!response.ok) {
      throw new FetchError(`HTTP ${response.status}`, CrawlErrorType.HTTP_ERROR, response.status);
    }

    return { url: response.url || url, status: response.status, body };
  } catch (error) {
    if (error instanceof FetchError) {
      throw error;
    }
    if (timedOut) {
      throw new FetchError(`Request timed out after ${timeout}ms`, CrawlErrorType.TIMEOUT, undefined, {
        cause: error,
      });
    }
    if (signal?.aborted) {
      throw new FetchError('Request aborted', CrawlErrorType.UNKNOWN, undefined, { cause: error });
    }
    const classified = classifyError(error);
    throw new FetchError(errorMessage(error), classified.type, classified.statusCode, { cause: error });
  } finally {
    clearTimeout(timeoutId);
    signal?.removeEventListener('abort', onAbort);
  }
}
