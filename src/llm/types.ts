/**
 * Completion Provider Interface
 * The narrow contract the name extractor needs from a hosted model
 */

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionRequest {
  messages: LLMMessage[];
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface LLMResponse {
  content: string;
  model: string;
}

export interface CompletionProvider {
  /** Provider name (e.g., 'openrouter') */
  name: string;

  complete(request: CompletionRequest): Promise<LLMResponse>;
}
