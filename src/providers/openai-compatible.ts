/**
 * @fileoverview OpenAI-compatible chat-completions backend.
 *
 * @module sql-audit-agent/providers/openai-compatible
 */

import { z } from 'zod';
import type { ChatMessage } from '../types/agent.types.js';
import { ProviderError } from '../errors.js';
import type { ModelBackend, OpenAICompatibleConfig } from './base.js';
import { DEFAULT_BASE_URL, DEFAULT_MODEL, ModelProvider } from './base.js';

const CompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z
          .object({
            content: z.string().nullish(),
          })
          .nullish(),
      }),
    )
    .default([]),
});

const ErrorBodySchema = z.object({
  error: z.object({
    message: z.string(),
    code: z.string().nullish(),
    type: z.string().nullish(),
  }),
});

function parseErrorBody(status: number, text: string): { message: string; code?: string } {
  let payload: unknown = null;
  try {
    payload = JSON.parse(text);
  } catch {
    payload = null;
  }

  const parsed = ErrorBodySchema.safeParse(payload);
  if (parsed.success) {
    const code = parsed.data.error.code ?? parsed.data.error.type ?? undefined;
    return { message: parsed.data.error.message, code };
  }
  return { message: text || `Request failed with status ${status}` };
}

/**
 * Talks to `<baseUrl>/chat/completions` with a bearer key.
 *
 * @example
 * ```typescript
 * const model = new OpenAICompatibleBackend({ apiKey: config.groqApiKey });
 * const reply = await model.complete(transcript.snapshot());
 * ```
 */
export class OpenAICompatibleBackend implements ModelBackend {
  readonly provider = ModelProvider.OPENAI_COMPATIBLE;

  private readonly baseUrl: string;
  private readonly model: string;
  private readonly temperature: number;

  constructor(private readonly config: OpenAICompatibleConfig) {
    if (!config.apiKey) {
      throw new ProviderError({
        provider: this.provider,
        message: 'API key is required for OpenAI-compatible providers.',
      });
    }
    this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.model = config.model ?? DEFAULT_MODEL;
    this.temperature = config.temperature ?? 0;
  }

  async complete(messages: ReadonlyArray<ChatMessage>): Promise<string> {
    const response = await fetch(`${this.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.config.apiKey}`,
      },
      body: JSON.stringify({
        model: this.model,
        messages,
        temperature: this.temperature,
      }),
    });

    if (!response.ok) {
      const details = parseErrorBody(response.status, await response.text());
      throw new ProviderError({
        provider: this.provider,
        message: details.message,
        status: response.status,
        code: details.code,
      });
    }

    const parsed = CompletionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ProviderError({
        provider: this.provider,
        message: `Malformed completion response: ${parsed.error.issues[0]?.message ?? 'unknown shape'}`,
        status: response.status,
      });
    }

    return parsed.data.choices[0]?.message?.content ?? '';
  }
}
