/**
 * @fileoverview Core type definitions for the audit agent runtime.
 *
 * These primitives are shared by every component: branded identifiers,
 * timestamps, the loop's phase vocabulary and log severities.
 *
 * @module sql-audit-agent/types
 * @version 0.1.0
 */

/**
 * Unique identifier type used throughout the system.
 * Format: UUID v4 string for global uniqueness.
 */
export type UniqueId = string & { readonly __brand: 'UniqueId' };

/**
 * Unix timestamp in milliseconds.
 */
export type Timestamp = number & { readonly __brand: 'Timestamp' };

/**
 * Phase of the conversation loop.
 *
 * The loop follows a strict state machine:
 * AWAITING_MODEL → (ACTIONS_FOUND | FINAL_FOUND | NEITHER) → (AWAITING_MODEL | TERMINATED)
 *
 * @remarks
 * - AWAITING_MODEL: a model completion has been requested for the current step
 * - ACTIONS_FOUND: the reply carried action lines and no final answer
 * - FINAL_FOUND: the reply carried a final answer and no action marker
 * - NEITHER: the reply carried nothing usable, or mixed both markers
 * - TERMINATED: the run ended with a final answer or by exhausting its steps
 * - FAILED: the model backend raised and the run was aborted
 */
export enum LoopPhase {
  AWAITING_MODEL = 'AWAITING_MODEL',
  ACTIONS_FOUND = 'ACTIONS_FOUND',
  FINAL_FOUND = 'FINAL_FOUND',
  NEITHER = 'NEITHER',
  TERMINATED = 'TERMINATED',
  FAILED = 'FAILED',
}

/**
 * Severity levels for logging.
 */
export enum Severity {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  FATAL = 'FATAL',
}

/**
 * Creates a branded UniqueId from a string.
 */
export function createUniqueId(value: string): UniqueId {
  return value as UniqueId;
}

/**
 * Creates a branded Timestamp from current time.
 */
export function createTimestamp(value?: number): Timestamp {
  return (value ?? Date.now()) as Timestamp;
}
