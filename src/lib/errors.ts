/**
 * Crawler Error Handling
 * Typed errors raised at component boundaries and error classification
 */

export enum CrawlErrorType {
  NETWORK_ERROR = 'NETWORK_ERROR',
  TIMEOUT = 'TIMEOUT',
  HTTP_ERROR = 'HTTP_ERROR',
  PARSE_ERROR = 'PARSE_ERROR',
  UNKNOWN = 'UNKNOWN',
}

export interface ClassifiedError {
  type: CrawlErrorType;
  message: string;
  statusCode?: number;
}

/**
 * Base class for all errors thrown by crawler components
 */
export class CrawlerError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Network failure, timeout or non-2xx response while fetching a page
 */
export class FetchError extends CrawlerError {
  constructor(
    message: string,
    public readonly type: CrawlErrorType,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, 'FETCH_FAILED', options);
  }
}

/**
 * LLM subpage selection failed or returned an unusable response
 */
export class SelectionError extends CrawlerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'SELECTION_FAILED', options);
  }
}

/**
 * LLM criterion analysis failed or returned an unusable response
 */
export class AnalysisError extends CrawlerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'ANALYSIS_FAILED', options);
  }
}

/**
 * Criteria catalog missing or invalid
 */
export class CatalogError extends CrawlerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CATALOG_INVALID', options);
  }
}

/**
 * Extract a message from any thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Classify an error (or a recorded error message) by failure kind
 */
export function classifyError(error: unknown, statusCode?: number): ClassifiedError {
  if (error instanceof FetchError) {
    return { type: error.type, message: error.message, statusCode: error.statusCode ?? statusCode };
  }

  const message = errorMessage(error);
  const lower = message.toLowerCase();

  if (
    lower.includes('timeout') ||
    lower.includes('timed out') ||
    message.includes('ETIMEDOUT') ||
    (error instanceof Error && error.name === 'AbortError')
  ) {
    return { type: CrawlErrorType.TIMEOUT, message, statusCode };
  }

  if (
    message.includes('ECONNREFUSED') ||
    message.includes('ECONNRESET') ||
    message.includes('ENOTFOUND') ||
    message.includes('EAI_AGAIN') ||
    lower.includes('connection') ||
    lower.includes('network') ||
    lower.includes('fetch failed')
  ) {
    return { type: CrawlErrorType.NETWORK_ERROR, message, statusCode };
  }

  const httpMatch = /\bHTTP (\d{3})\b/.exec(message);
  if (statusCode !== undefined || httpMatch) {
    return {
      type: CrawlErrorType.HTTP_ERROR,
      message,
      statusCode: statusCode ?? (httpMatch ? parseInt(httpMatch[1], 10) : undefined),
    };
  }

  if (lower.includes('parse') || lower.includes('json')) {
    return { type: CrawlErrorType.PARSE_ERROR, message, statusCode };
  }

  return { type: CrawlErrorType.UNKNOWN, message, statusCode };
}

/**
 * Work stopped because the caller aborted it
 */
export class CancelledError extends CrawlerError {
  constructor(message: string = 'Operation cancelled') {
    super(message, 'CANCELLED');
  }
}
