/**
 * @fileoverview Scripted backend - replays canned replies.
 *
 * @module sql-audit-agent/providers/scripted
 */

import type { ChatMessage } from '../types/agent.types.js';
import { ProviderError } from '../errors.js';
import type { ModelBackend } from './base.js';
import { ModelProvider } from './base.js';

/**
 * Computes a reply from the transcript and the 0-based call index.
 */
export type ReplyFunction = (messages: ReadonlyArray<ChatMessage>, call: number) => string | Promise<string>;

/**
 * A backend that answers from a fixed list, or from a function.
 *
 * Every call records the transcript it was given. Running past the end of
 * the list rejects with a ProviderError.
 */
export class ScriptedBackend implements ModelBackend {
  readonly provider = ModelProvider.SCRIPTED;
  readonly calls: ReadonlyArray<ChatMessage>[] = [];

  private readonly script: ReadonlyArray<string> | ReplyFunction;

  constructor(script: ReadonlyArray<string> | ReplyFunction) {
    this.script = script;
  }

  async complete(messages: ReadonlyArray<ChatMessage>): Promise<string> {
    const call = this.calls.length;
    this.calls.push([...messages]);

    if (typeof this.script === 'function') {
      return this.script(messages, call);
    }

    const reply = this.script[call];
    if (reply === undefined) {
      throw new ProviderError({
        provider: this.provider,
        message: `Script exhausted after ${this.script.length} replies`,
      });
    }
    return reply;
  }
}
