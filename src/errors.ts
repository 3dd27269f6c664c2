/**
 * @fileoverview Typed errors raised at the system's seams.
 *
 * None of these reach the model as objects: the dispatcher turns them into
 * observation text, and the CLI prints their messages.
 *
 * @module sql-audit-agent/errors
 * @version 0.1.0
 */

/**
 * A tool received arguments of the wrong shape.
 */
export class ArgumentBindingError extends Error {
  readonly toolName: string;
  readonly issues: ReadonlyArray<string>;

  constructor(toolName: string, issues: ReadonlyArray<string>) {
    super(issues.join('; '));
    this.name = 'ArgumentBindingError';
    this.toolName = toolName;
    this.issues = issues;
  }
}

/**
 * The model backend answered with a failure.
 */
export class ProviderError extends Error {
  readonly provider: string;
  readonly status: number | undefined;
  readonly code: string | undefined;

  constructor(params: { provider: string; message: string; status?: number; code?: string }) {
    super(params.message);
    this.name = 'ProviderError';
    this.provider = params.provider;
    this.status = params.status;
    this.code = params.code;
  }
}

/**
 * The environment does not describe a usable configuration.
 */
export class ConfigError extends Error {
  readonly issues: ReadonlyArray<string>;

  constructor(issues: ReadonlyArray<string>) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Message text of anything thrown.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
