/**
 * @fileoverview Transcript - the append-only conversation state of one run.
 *
 * Messages are only ever appended. Readers get frozen snapshots, so a
 * model backend holding on to an earlier snapshot never sees later turns.
 *
 * @module sql-audit-agent/agent/transcript
 * @version 0.1.0
 */

import type { ChatMessage, ChatRole } from '../types/agent.types.js';

/**
 * Ordered message list owned by exactly one run.
 *
 * @example
 * ```typescript
 * const transcript = new Transcript(systemPrompt);
 * transcript.append('user', question);
 * const reply = await model.complete(transcript.snapshot());
 * transcript.append('assistant', reply);
 * ```
 */
export class Transcript {
  private readonly messages: ChatMessage[] = [];

  constructor(systemPrompt?: string) {
    if (systemPrompt !== undefined) {
      this.append('system', systemPrompt);
    }
  }

  append(role: ChatRole, content: string): void {
    this.messages.push(Object.freeze({ role, content }));
  }

  /**
   * Returns the messages so far. The array is a copy.
   */
  snapshot(): ReadonlyArray<ChatMessage> {
    return Object.freeze([...this.messages]);
  }

  get length(): number {
    return this.messages.length;
  }

  /**
   * Gets the most recent message, or null for an empty transcript.
   */
  last(): ChatMessage | null {
    return this.messages[this.messages.length - 1] ?? null;
  }
}
