/**
 * Scripted Provider
 *
 * Returns queued responses in order. Used by tests and for offline runs;
 * every call is recorded so tests can assert on the prompts that were sent.
 */

import type { ChatOptions, ChatResponse, LLMProvider, Message } from '../types.js';

export class ScriptedProvider implements LLMProvider {
  readonly name = 'scripted';
  readonly defaultModel = 'scripted-model';

  private queue: string[];
  readonly calls: Array<{ messages: Message[]; options?: ChatOptions }> = [];

  /**
   * @param responses - Replies in call order. When the queue runs dry the last
   *   reply repeats; with no replies at all every call returns ''.
   */
  constructor(responses: string[] = []) {
    this.queue = [...responses];
  }

  async chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    this.calls.push({ messages, options });

    const content = this.queue.length > 1 ? (this.queue.shift() ?? '') : (this.queue[0] ?? '');

    return {
      content,
      stopReason: 'end_turn',
      usage: { inputTokens: 0, outputTokens: 0 },
    };
  }

  enqueue(...responses: string[]): void {
    this.queue.push(...responses);
  }

  /** User-message content of every call so far */
  prompts(): string[] {
    return this.calls.map((c) => c.messages.filter((m) => m.role === 'user').map((m) => m.content).join('\n'));
  }
}
