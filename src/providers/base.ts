/**
 * @fileoverview Base model backend interface.
 *
 * The conversation loop treats the language model as an opaque text
 * completion function: the whole transcript goes in, one reply comes out.
 * Backends differ only in how they reach a model.
 *
 * @module sql-audit-agent/providers
 */

import type { ChatMessage } from '../types/agent.types.js';

/**
 * Supported model backends.
 */
export enum ModelProvider {
  /** Any server speaking the OpenAI chat-completions API (Groq by default) */
  OPENAI_COMPATIBLE = 'openai-compatible',

  /** Canned replies, for tests and offline demos */
  SCRIPTED = 'scripted',
}

/**
 * A text-completion function over a chat transcript.
 */
export interface ModelBackend {
  readonly provider: ModelProvider;

  /**
   * Returns the model's reply to the transcript.
   *
   * @throws ProviderError when the backend cannot produce a reply
   */
  complete(messages: ReadonlyArray<ChatMessage>): Promise<string>;
}

/**
 * Connection settings for an OpenAI-compatible backend.
 */
export interface OpenAICompatibleConfig {
  readonly apiKey: string;

  /** Defaults to the Groq endpoint */
  readonly baseUrl?: string | undefined;

  /** Defaults to llama-3.1-8b-instant */
  readonly model?: string | undefined;

  /** Sampling temperature, 0 unless set */
  readonly temperature?: number | undefined;
}

export const DEFAULT_BASE_URL = 'https://api.groq.com/openai/v1';
export const DEFAULT_MODEL = 'llama-3.1-8b-instant';
