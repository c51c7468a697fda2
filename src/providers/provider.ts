/**
 * Provider Factory
 *
 * Builds providers from explicit configuration. There is no global client:
 * each collaborator receives the provider it should call.
 */

import { ProviderError } from '../errors/index.js';
import { OpenAICompatibleProvider } from './adapters/openai-compatible.js';
import { ScriptedProvider } from './adapters/scripted.js';
import type { LLMProvider, Message, ProviderConfig } from './types.js';

export function createProvider(config: ProviderConfig): LLMProvider {
  switch (config.type) {
    case 'openai-compatible':
      return new OpenAICompatibleProvider(config.config);
    case 'scripted':
      return new ScriptedProvider(config.responses);
    default: {
      const unknownType: never = config;
      throw new ProviderError(
        `Unknown provider type: ${JSON.stringify(unknownType)}`,
        'unknown',
        'INVALID_REQUEST',
      );
    }
  }
}

export const JSON_SYSTEM_PROMPT = 'Return only valid JSON.';

/**
 * Send one prompt under the JSON-only system message and return the text.
 */
export async function completeJson(provider: LLMProvider, prompt: string, model?: string): Promise<string> {
  const messages: Message[] = [
    { role: 'system', content: JSON_SYSTEM_PROMPT },
    { role: 'user', content: prompt },
  ];
  const response = await provider.chat(messages, model ? { model } : undefined);
  return response.content;
}
