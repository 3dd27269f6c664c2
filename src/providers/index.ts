/**
 * @fileoverview Provider exports
 */

export * from './base.js';
export * from './openai-compatible.js';
export * from './scripted.js';

import type { ModelBackend, OpenAICompatibleConfig } from './base.js';
import { OpenAICompatibleBackend } from './openai-compatible.js';

/**
 * Creates the production backend.
 */
export function createModelBackend(config: OpenAICompatibleConfig): ModelBackend {
  return new OpenAICompatibleBackend(config);
}
