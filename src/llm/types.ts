// LLM and embedding provider contracts consumed by the router

export type ProviderId = 'openai';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface CompletionResult {
  content: string;
  tokensUsed: number;
  model: string;
  provider: ProviderId;
}

/**
 * Chat completion service: system + user prompt in, text out
 */
export interface CompletionProvider {
  complete(messages: ChatMessage[], options?: CompletionOptions): Promise<CompletionResult>;
}

export interface EmbeddingOptions {
  signal?: AbortSignal;
}

/**
 * Text embedding service. Identical text must yield identical vectors.
 */
export interface EmbeddingProvider {
  embed(text: string, options?: EmbeddingOptions): Promise<number[]>;
}
