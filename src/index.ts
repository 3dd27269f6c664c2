/**
 * @fileoverview SQL Audit Agent - public API.
 *
 * An autonomous security-analysis agent: a language model asks for
 * read-only SQL queries and audit actions through `ACTION:` lines, the
 * agent runs them and feeds the results back until the model gives a
 * `FINAL ANSWER:`.
 *
 * @module sql-audit-agent
 * @version 0.1.0
 */

export * from './types/index.js';
export * from './errors.js';

export {
  ACTION_MARKER,
  NO_CALL,
  coerceScalar,
  extractActionLines,
  formatCall,
  formatScalar,
  isParsedCall,
  parseActionLine,
  scalarValue,
} from './parser/action-parser.js';

export * from './tools/index.js';
export * from './agent/index.js';
export * from './providers/index.js';
export * from './observability/index.js';

export { loadConfig, type AuditConfig, type LoadConfigOptions } from './config/index.js';
export {
  createAgent,
  createToolRegistry,
  describeTools,
  readQuestion,
  runInteractive,
  isQuitWord,
  type Agent,
  type AgentOptions,
  type AgentOverrides,
  type SessionIO,
} from './cli/session.js';
