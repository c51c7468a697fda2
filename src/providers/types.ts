/**
 * Provider Types
 *
 * The narrow completion interface every collaborator talks to. Calls are
 * plain request/response; nothing here streams.
 */

export interface Message {
  role: 'user' | 'assistant' | 'system';
  content: string;
}

export interface ChatOptions {
  maxTokens?: number;

  /** Temperature for randomness (0-2) */
  temperature?: number;

  /** Model override (uses provider default if not specified) */
  model?: string;
}

export interface ChatResponse {
  content: string;
  stopReason: 'end_turn' | 'max_tokens' | 'stop_sequence';
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

export interface LLMProvider {
  /** Provider name for logging/debugging */
  readonly name: string;
  readonly defaultModel: string;

  chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse>;
}

/**
 * Configuration for any endpoint speaking the OpenAI chat-completions
 * protocol (Groq, Gemini's compatibility layer, OpenAI itself).
 */
export interface OpenAICompatibleConfig {
  /** Label used in logs and errors, e.g. "groq" */
  name: string;
  apiKey: string;
  model: string;
  /** Base URL including the version segment, e.g. https://api.groq.com/openai/v1 */
  baseUrl: string;
  timeoutMs?: number;
  maxRetries?: number;
}

export type ProviderConfig =
  | { type: 'openai-compatible'; config: OpenAICompatibleConfig }
  | { type: 'scripted'; responses: string[] };
