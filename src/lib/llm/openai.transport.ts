/**
 * OpenAI Transport
 * Chat completions against any OpenAI-compatible endpoint
 */

import type OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import type { ChatCompletionRequest, ChatMessage, ChatTransport } from './llm.types';

export interface OpenAITransportOptions {
  apiKey: string;
  baseURL?: string;
  model: string;
  timeout: number;
}

function toMessageParam(message: ChatMessage): ChatCompletionMessageParam {
  return message.role === 'system'
    ? { role: 'system', content: message.content }
    : { role: 'user', content: message.content };
}

export class OpenAIChatTransport implements ChatTransport {
  private client: OpenAI | null = null;

  constructor(private readonly options: OpenAITransportOptions) {}

  get model(): string {
    return this.options.model;
  }

  /**
   * Lazy load OpenAI client
   */
  private async getClient(): Promise<OpenAI> {
    if (!this.client) {
      const { default: OpenAIClient } = await import('openai');
      this.client = new OpenAIClient({
        apiKey: this.options.apiKey,
        baseURL: this.options.baseURL,
        timeout: this.options.timeout,
        maxRetries: 1,
      });
    }
    return this.client;
  }

  async complete(request: ChatCompletionRequest): Promise<string> {
    const client = await this.getClient();

    try {
      const response = await client.chat.completions.create(
        {
          model: this.options.model,
          messages: request.messages.map(toMessageParam),
          temperature: request.temperature,
          max_tokens: request.maxTokens,
          response_format: request.jsonMode ? { type: 'json_object' } : undefined,
        },
        { signal: request.signal }
      );

      const text = response.choices[0]?.message?.content ?? '';
      if (!text) {
        throw new Error('Empty response from LLM');
      }
      return text;
    } catch (error) {
      if (error instanceof Error && 'status' in error) {
        if (error.status === 429) {
          throw new Error('LLM rate limit exceeded. Please try again later.', { cause: error });
        }
        if (error.status === 401) {
          throw new Error('LLM API key is invalid', { cause: error });
        }
      }
      throw error;
    }
  }
}
