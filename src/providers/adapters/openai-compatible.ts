/**
 * OpenAI-Compatible Provider Adapter
 *
 * Talks to any `/chat/completions` endpoint: Groq for generation, review and
 * scoring, Gemini's compatibility layer for the export step.
 */

import { ProviderError } from '../../errors/index.js';
import { createComponentLogger, type StructuredLogger } from '../../observability/logger.js';
import { resilientFetch, type NetworkConfig } from '../resilient-fetch.js';
import type {
  ChatOptions,
  ChatResponse,
  LLMProvider,
  Message,
  OpenAICompatibleConfig,
} from '../types.js';

// =============================================================================
// API TYPES
// =============================================================================

interface ChatCompletion {
  choices: Array<{
    message: { role: string; content: string | null };
    finish_reason: string | null;
  }>;
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
  };
}

function isChatCompletion(value: unknown): value is ChatCompletion {
  if (typeof value !== 'object' || value === null || !('choices' in value)) return false;
  return Array.isArray(value.choices) && value.choices.length > 0;
}

// =============================================================================
// PROVIDER
// =============================================================================

export class OpenAICompatibleProvider implements LLMProvider {
  readonly name: string;
  readonly defaultModel: string;

  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly networkConfig: NetworkConfig;
  private readonly logger: StructuredLogger;

  constructor(config: OpenAICompatibleConfig, options: { networkConfig?: NetworkConfig; logger?: StructuredLogger } = {}) {
    this.name = config.name;
    this.defaultModel = config.model;
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.networkConfig = {
      timeout: config.timeoutMs ?? 120000,
      maxRetries: config.maxRetries ?? 3,
      baseRetryDelay: 1000,
      ...options.networkConfig,
    };
    this.logger = options.logger ?? createComponentLogger(`provider:${config.name}`);
  }

  async chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    const body = {
      model: options?.model ?? this.defaultModel,
      messages: messages.map((m) => ({ role: m.role, content: m.content })),
      stream: false,
      ...(options?.maxTokens !== undefined && { max_tokens: options.maxTokens }),
      ...(options?.temperature !== undefined && { temperature: options.temperature }),
    };

    try {
      const { response } = await resilientFetch({
        url: `${this.baseUrl}/chat/completions`,
        init: {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${this.apiKey}`,
          },
          body: JSON.stringify(body),
        },
        providerName: this.name,
        networkConfig: this.networkConfig,
        onRetry: (attempt, delay, error) => {
          this.logger.warn(`Retry attempt ${attempt} after ${Math.round(delay)}ms`, {
            error: error.message,
          });
        },
      });

      if (!response.ok) {
        throw ProviderError.fromStatus(this.name, response.status, await response.text());
      }

      const data: unknown = await response.json();
      if (!isChatCompletion(data)) {
        throw new ProviderError(
          `${this.name} returned a response without choices`,
          this.name,
          'UNKNOWN',
          response.status,
        );
      }
      return this.parseResponse(data);
    } catch (error) {
      if (error instanceof ProviderError) throw error;
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ProviderError(
        `${this.name} request failed: ${cause.message}`,
        this.name,
        'NETWORK_ERROR',
        undefined,
        cause,
      );
    }
  }

  private parseResponse(data: ChatCompletion): ChatResponse {
    const choice = data.choices[0];

    return {
      content: choice.message.content ?? '',
      stopReason: choice.finish_reason === 'length' ? 'max_tokens' : 'end_turn',
      ...(data.usage && {
        usage: {
          inputTokens: data.usage.prompt_tokens,
          outputTokens: data.usage.completion_tokens,
        },
      }),
    };
  }
}
