/**
 * @fileoverview Conversation and step types shared by the parser, the
 * dispatcher, the loop and the reporter.
 *
 * @module sql-audit-agent/types/agent
 * @version 0.1.0
 */

/**
 * Role of a message in the transcript.
 */
export type ChatRole = 'system' | 'user' | 'assistant';

/**
 * A single role-tagged message sent to the model.
 */
export interface ChatMessage {
  readonly role: ChatRole;
  readonly content: string;
}

/**
 * A coerced argument value from an action line.
 */
export type Scalar =
  | { readonly kind: 'int'; readonly value: number | bigint }
  | { readonly kind: 'float'; readonly value: number }
  | { readonly kind: 'bool'; readonly value: boolean }
  | { readonly kind: 'null' }
  | { readonly kind: 'string'; readonly value: string };

/**
 * A well-formed action line.
 */
export interface ParsedCall {
  readonly toolName: string;
  readonly positionalArgs: ReadonlyArray<Scalar>;
  readonly keywordArgs: Readonly<Record<string, Scalar>>;
}

/**
 * The result of parsing a line that is not a well-formed call.
 */
export interface UnparsedCall {
  readonly toolName: null;
  readonly positionalArgs: null;
  readonly keywordArgs: null;
}

export type ParseResult = ParsedCall | UnparsedCall;

/**
 * Outcome of one executed tool call. `result` is always text, errors included.
 */
export interface ToolResult {
  readonly tool: string;
  readonly result: string;
}

/**
 * Everything that happened in one non-terminal step.
 */
export interface StepRecord {
  readonly step: number;
  readonly thought: string;
  readonly tools: ReadonlyArray<ToolResult>;
}

/**
 * Answer reported when a run exhausts its step budget.
 */
export const MAX_STEPS_ANSWER = 'Max steps reached.';

/**
 * Final outcome of a run.
 */
export type RunOutcome =
  | {
      readonly status: 'final';
      readonly thought: string;
      readonly answer: string;
      readonly steps: ReadonlyArray<StepRecord>;
    }
  | {
      readonly status: 'max_steps';
      readonly answer: typeof MAX_STEPS_ANSWER;
      readonly steps: ReadonlyArray<StepRecord>;
    };
