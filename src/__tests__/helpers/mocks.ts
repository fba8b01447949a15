/**
 * Shared Mocks
 * Reusable stand-ins for network and LLM collaborators
 */

import { CrawlErrorType, FetchError } from '../../lib/errors';
import type { FetchBackend, FetchOptions, RawPage } from '../../lib/fetching';
import type {
  CriterionAnalysisRequest,
  CriterionAnalysisResponse,
  LLMClient,
  SubpageSelectionRequest,
  SubpageSelectionResponse,
} from '../../lib/llm';

/**
 * In-memory fetch backend. A string entry is served as HTML, a number as an HTTP error status.
 */
export function createStubBackend(pages: Record<string, string | number>) {
  const calls: string[] = [];

  const backend: FetchBackend = {
    name: 'stub',
    fetch: async (url: string, _options: FetchOptions): Promise<RawPage> => {
      calls.push(url);
      const entry = pages[url];
      if (entry === undefined) {
        throw new FetchError('HTTP 404', CrawlErrorType.HTTP_ERROR, 404);
      }
      if (typeof entry === 'number') {
        throw new FetchError(`HTTP ${entry}`, CrawlErrorType.HTTP_ERROR, entry);
      }
      return { url, html: entry, statusCode: 200 };
    },
  };

  return { backend, calls };
}

/**
 * LLM client whose two operations are jest mocks
 */
export function createMockLLMClient() {
  const selectSubpages = jest.fn<Promise<SubpageSelectionResponse>, [SubpageSelectionRequest, AbortSignal?]>();
  const analyzeCriterion = jest.fn<Promise<CriterionAnalysisResponse>, [CriterionAnalysisRequest, AbortSignal?]>();

  const client: LLMClient = { selectSubpages, analyzeCriterion };

  return { client, selectSubpages, analyzeCriterion };
}

/**
 * Immediate sleep that still honours abort signals
 */
export function createInstantSleep() {
  return jest.fn(async (_ms: number, signal?: AbortSignal): Promise<void> => {
    if (signal?.aborted) {
      throw new Error('Aborted');
    }
  });
}
