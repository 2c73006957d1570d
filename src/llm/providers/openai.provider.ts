import OpenAI from 'openai';
import type {
  ChatMessage,
  CompletionOptions,
  CompletionProvider,
  CompletionResult,
  EmbeddingOptions,
  EmbeddingProvider,
} from '../types.js';
import logger from '../../utils/logger.js';
import { getErrorMessage } from '../../utils/errors.js';

/**
 * The router never retries a model call: a failure degrades to a
 * deterministic fallback instead, so the SDK's own retries are disabled.
 */
export function createOpenAIClient(apiKey: string): OpenAI {
  return new OpenAI({ apiKey, maxRetries: 0 });
}

export const MAX_EMBEDDING_INPUT_CHARS = 8000;

// Reasoning models reject a custom temperature
function supportsTemperature(model: string): boolean {
  return !/^(o\d|gpt-5)/.test(model);
}

export class OpenAICompletionProvider implements CompletionProvider {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string
  ) {}

  async complete(messages: ChatMessage[], options: CompletionOptions = {}): Promise<CompletionResult> {
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: messages.map(m => ({ role: m.role, content: m.content })),
          ...(supportsTemperature(this.model) ? { temperature: options.temperature ?? 0 } : {}),
          max_completion_tokens: options.maxTokens,
        },
        { signal: options.signal }
      );

      return {
        content: response.choices[0]?.message?.content || '',
        tokensUsed: response.usage?.total_tokens || 0,
        model: this.model,
        provider: 'openai',
      };
    } catch (error) {
      logger.error('OpenAI completion failed', { error: getErrorMessage(error), model: this.model });
      throw error;
    }
  }
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string
  ) {}

  async embed(text: string, options: EmbeddingOptions = {}): Promise<number[]> {
    if (text.length > MAX_EMBEDDING_INPUT_CHARS) {
      throw new Error(`Embedding input is ${text.length} characters, limit is ${MAX_EMBEDDING_INPUT_CHARS}`);
    }

    const response = await this.client.embeddings.create(
      { model: this.model, input: text },
      { signal: options.signal }
    );

    const embedding = response.data[0]?.embedding;
    if (!embedding) {
      throw new Error(`OpenAI returned no embedding for model ${this.model}`);
    }
    return embedding;
  }
}
