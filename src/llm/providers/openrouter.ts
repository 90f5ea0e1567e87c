/**
 * OpenRouter Provider
 * OpenAI-compatible API with access to multiple model providers
 *
 * Base URL: https://openrouter.ai/api/v1
 */

import OpenAI from 'openai';
import type { CompletionProvider, CompletionRequest, LLMResponse } from '../types';

export interface OpenRouterOptions {
  apiKey: string;
  model: string;
  baseUrl?: string;
  timeoutMs?: number;
}

export class OpenRouterProvider implements CompletionProvider {
  name = 'openrouter';
  private client: OpenAI;
  private defaultModel: string;

  constructor(options: OpenRouterOptions) {
    this.defaultModel = options.model;
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl ?? 'https://openrouter.ai/api/v1',
      timeout: options.timeoutMs,
      maxRetries: 0,
      defaultHeaders: {
        'X-Title': 'gitops-onboard',
      },
    });
  }

  async complete(request: CompletionRequest): Promise<LLMResponse> {
    const response = await this.client.chat.completions.create({
      model: request.model || this.defaultModel,
      messages: request.messages.map(m => ({ role: m.role, content: m.content })),
      max_tokens: request.maxTokens,
      temperature: request.temperature,
    });

    const choice = response.choices?.[0];
    if (!choice) {
      throw new Error('OpenRouter response missing choices');
    }

    return {
      content: choice.message.content || '',
      model: response.model,
    };
  }
}
