/**
 * LLM Client
 * Implements subpage selection and criterion analysis on top of a chat transport
 */

import { env } from '../../config/env';
import { AnalysisError, errorMessage, SelectionError } from '../errors';
import { OpenAIChatTransport } from './openai.transport';
import {
  ANALYSIS_SYSTEM_PROMPT,
  buildAnalysisPrompt,
  buildSelectionPrompt,
  buildSummaryPrompt,
  SELECTION_SYSTEM_PROMPT,
  SUMMARY_SYSTEM_PROMPT,
} from './llm.prompts';
import { criterionAnalysisSchema, extractJson, subpageSelectionSchema } from './llm.schemas';
import type {
  ChatTransport,
  CriterionAnalysisRequest,
  CriterionAnalysisResponse,
  LLMClient,
  OrganizationSummarizer,
  SubpageSelectionRequest,
  SubpageSelectionResponse,
} from './llm.types';
import type { ZodError } from 'zod';

export interface LLMClientSettings {
  temperature: number;
  maxTokens: number;
}

const SELECTION_MAX_TOKENS = 2000;
const SUMMARY_TEMPERATURE = 0.7;
const SUMMARY_MAX_TOKENS = 500;

function describeIssues(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'response'}: ${issue.message}`).join('; ');
}

export class ChatLLMClient implements LLMClient, OrganizationSummarizer {
  constructor(
    private readonly transport: ChatTransport,
    private readonly settings: LLMClientSettings = {
      temperature: env.LLM_TEMPERATURE,
      maxTokens: env.LLM_MAX_TOKENS,
    }
  ) {}

  get model(): string {
    return this.transport.model;
  }

  async selectSubpages(request: SubpageSelectionRequest, signal?: AbortSignal): Promise<SubpageSelectionResponse> {
    let payload: unknown;
    try {
      const text = await this.transport.complete({
        messages: [
          { role: 'system', content: SELECTION_SYSTEM_PROMPT },
          { role: 'user', content: buildSelectionPrompt(request) },
        ],
        temperature: this.settings.temperature,
        maxTokens: SELECTION_MAX_TOKENS,
        jsonMode: true,
        signal,
      });
      payload = extractJson(text);
    } catch (error) {
      throw new SelectionError(`Subpage selection failed: ${errorMessage(error)}`, { cause: error });
    }

    const parsed = subpageSelectionSchema.safeParse(payload);
    if (!parsed.success) {
      throw new SelectionError(`Invalid subpage selection response: ${describeIssues(parsed.error)}`);
    }

    return {
      selectedUrls: parsed.data.selected_urls,
      reasoning: parsed.data.reasoning ?? '',
      relevanceScores: parsed.data.relevance_scores ?? {},
    };
  }

  async analyzeCriterion(request: CriterionAnalysisRequest, signal?: AbortSignal): Promise<CriterionAnalysisResponse> {
    let payload: unknown;
    try {
      const text = await this.transport.complete({
        messages: [
          { role: 'system', content: ANALYSIS_SYSTEM_PROMPT },
          { role: 'user', content: buildAnalysisPrompt(request) },
        ],
        temperature: this.settings.temperature,
        maxTokens: this.settings.maxTokens,
        jsonMode: true,
        signal,
      });
      payload = extractJson(text);
    } catch (error) {
      throw new AnalysisError(`Analysis of "${request.criterionName}" failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const parsed = criterionAnalysisSchema.safeParse(payload);
    if (!parsed.success) {
      throw new AnalysisError(`Invalid analysis response for "${request.criterionName}": ${describeIssues(parsed.error)}`);
    }

    return {
      fulfilled: parsed.data.fulfilled,
      confidence: parsed.data.confidence,
      justification: parsed.data.justification,
      evidence: parsed.data.evidence,
    };
  }

  /**
   * Free-text summary of an organization's results. Failures come back as text.
   */
  async summarizeOrganization(organizationName: string, results: unknown): Promise<string> {
    try {
      const text = await this.transport.complete({
        messages: [
          { role: 'system', content: SUMMARY_SYSTEM_PROMPT },
          { role: 'user', content: buildSummaryPrompt(organizationName, results) },
        ],
        temperature: SUMMARY_TEMPERATURE,
        maxTokens: SUMMARY_MAX_TOKENS,
        jsonMode: false,
      });
      return text.trim();
    } catch (error) {
      console.error(`[LLM] Summary generation failed for ${organizationName}:`, error);
      return `Zusammenfassung konnte nicht erstellt werden: ${errorMessage(error)}`;
    }
  }

  async testConnection(): Promise<boolean> {
    try {
      const text = await this.transport.complete({
        messages: [{ role: 'user', content: "Test connection. Respond with 'OK'." }],
        temperature: 0,
        maxTokens: 10,
        jsonMode: false,
      });
      return text.includes('OK');
    } catch (error) {
      console.error('[LLM] Connection test failed:', error);
      return false;
    }
  }
}

/**
 * Client configured from the environment, or null when no API key is set or the LLM is disabled
 */
export function createLLMClientFromEnv(): ChatLLMClient | null {
  if (!env.LLM_ENABLED || !env.OPENAI_API_KEY) {
    return null;
  }

  return new ChatLLMClient(
    new OpenAIChatTransport({
      apiKey: env.OPENAI_API_KEY,
      baseURL: env.OPENAI_BASE_URL,
      model: env.OPENAI_MODEL,
      timeout: env.LLM_TIMEOUT,
    })
  );
}
