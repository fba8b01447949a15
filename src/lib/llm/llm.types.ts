/**
 * LLM Types
 * Contracts between the crawler/evaluator and a language model
 */

export interface SubpageCandidate {
  url: string;
  title: string;
}

export interface SubpageSelectionRequest {
  organizationName: string;
  baseUrl: string;
  candidates: SubpageCandidate[];
  criteriaNames: string[];

  /**
   * Number of subpages wanted, main page excluded
   */
  maxPages: number;
}

export interface SubpageSelectionResponse {
  /**
   * Ranked, most relevant first
   */
  selectedUrls: string[];
  reasoning: string;
  relevanceScores: Record<string, number>;
}

export interface CriterionAnalysisRequest {
  content: string;
  criterionName: string;
  criterionDescription: string;
  patterns: string[];
  sourceUrl: string;
}

export interface CriterionAnalysisResponse {
  fulfilled: boolean;
  confidence: number;
  justification: string;
  evidence: string[];
}

/**
 * What the crawler and the evaluator need from a language model.
 * Implementations throw SelectionError / AnalysisError.
 */
export interface LLMClient {
  selectSubpages(request: SubpageSelectionRequest, signal?: AbortSignal): Promise<SubpageSelectionResponse>;
  analyzeCriterion(request: CriterionAnalysisRequest, signal?: AbortSignal): Promise<CriterionAnalysisResponse>;
}

/**
 * Free-text summary of an organization's results; never throws
 */
export interface OrganizationSummarizer {
  summarizeOrganization(organizationName: string, results: unknown): Promise<string>;
}

export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

export interface ChatCompletionRequest {
  messages: ChatMessage[];
  temperature: number;
  maxTokens: number;
  jsonMode: boolean;
  signal?: AbortSignal;
}

/**
 * Provider-specific chat completion call
 */
export interface ChatTransport {
  readonly model: string;
  complete(request: ChatCompletionRequest): Promise<string>;
}
