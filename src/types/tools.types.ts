/**
 * @fileoverview Tool contract type definitions.
 *
 * Tools are the only way the agent touches the outside world. Each one is a
 * tagged variant of a closed set of kinds, carries its own parameter list and
 * zod schema, and always answers with a single string.
 *
 * @module sql-audit-agent/types/tools
 * @version 0.1.0
 */

import { z } from 'zod';
import type { UniqueId } from './core.types.js';

/**
 * The closed set of tool kinds.
 */
export enum ToolKind {
  /** Read-only database retrieval */
  QUERY = 'QUERY',

  /** Security alert persistence */
  ALERT = 'ALERT',

  /** Outbound email */
  EMAIL = 'EMAIL',

  /** Analysis report persistence */
  REPORT = 'REPORT',

  /** Manual review request */
  REVIEW = 'REVIEW',
}

/**
 * A named parameter, in call order.
 */
export interface ToolParameter {
  readonly name: string;
  readonly description: string;
  readonly optional?: boolean;
}

/**
 * Complete definition of a tool, after type erasure.
 *
 * `run` receives the bound argument object and validates it against the
 * tool's schema before calling the implementation.
 */
export interface ToolDefinition {
  readonly name: string;
  readonly kind: ToolKind;
  readonly description: string;
  readonly parameters: ReadonlyArray<ToolParameter>;
  run(args: Readonly<Record<string, unknown>>): Promise<string>;
}

/**
 * Typed definition accepted by {@link defineTool}.
 */
export interface ToolSpec<TSchema extends z.ZodTypeAny> {
  readonly name: string;
  readonly kind: ToolKind;
  readonly description: string;
  readonly parameters: ReadonlyArray<ToolParameter>;
  readonly schema: TSchema;
  execute(args: z.output<TSchema>): Promise<string>;
}

/**
 * Result of looking a tool up by name.
 */
export type ToolLookup =
  | { readonly found: true; readonly tool: ToolDefinition }
  | { readonly found: false; readonly name: string };

/**
 * Logger interface handed to tools.
 */
export interface ExecutionLogger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Record kept for every invocation the registry performs.
 */
export interface ToolInvocationRecord {
  readonly executionId: UniqueId;
  readonly toolName: string;
  readonly durationMs: number;
  readonly success: boolean;
}

/**
 * Accepts a string or an integer and yields a string.
 * Identifiers such as user ids reach the tools as ints when unquoted, and as
 * bigints when they are too long for a number.
 */
export const IdentifierSchema = z
  .union([z.string(), z.number(), z.bigint()])
  .transform((value) => String(value));
