/**
 * @fileoverview Action-call parser.
 *
 * Turns one line of model output such as
 * `ACTION: query_postgres(query="SELECT 1", limit=5)` into a tool name plus
 * positional and keyword arguments. Values are coerced to tagged scalars.
 *
 * The parser never throws: a line that is not a well-formed call yields
 * {@link NO_CALL}.
 *
 * @module sql-audit-agent/parser/action-parser
 * @version 0.1.0
 */

import type { ParseResult, ParsedCall, Scalar, UnparsedCall } from '../types/agent.types.js';

/**
 * Marker that starts an action line.
 */
export const ACTION_MARKER = 'ACTION:';

/**
 * Result for lines that are not well-formed calls.
 */
export const NO_CALL: UnparsedCall = Object.freeze({
  toolName: null,
  positionalArgs: null,
  keywordArgs: null,
});

const INTEGER_PATTERN = /^\d+$/;
const FLOAT_PATTERN = /^\d+\.\d+$/;

/**
 * Tracks which quote style is open while scanning.
 * A quote toggles its own flag only while the other style is closed.
 */
class QuoteState {
  private single = false;
  private double = false;

  feed(char: string): void {
    if (char === "'" && !this.double) {
      this.single = !this.single;
    } else if (char === '"' && !this.single) {
      this.double = !this.double;
    }
  }

  get open(): boolean {
    return this.single || this.double;
  }
}

/**
 * Narrows a parse result to a well-formed call.
 */
export function isParsedCall(result: ParseResult): result is ParsedCall {
  return result.toolName !== null;
}

/**
 * Returns the lines of a reply that are action lines, in order.
 */
export function extractActionLines(reply: string): string[] {
  return reply.split('\n').filter((line) => line.trim().startsWith(ACTION_MARKER));
}

/**
 * Parses a single line into a call.
 *
 * @example
 * ```typescript
 * parseActionLine('ACTION: get_table_schema(users)');
 * // { toolName: 'get_table_schema', positionalArgs: [{ kind: 'string', value: 'users' }], keywordArgs: {} }
 * ```
 */
export function parseActionLine(line: string): ParseResult {
  const trimmed = line.trim();
  if (!trimmed.startsWith(ACTION_MARKER)) {
    return NO_CALL;
  }

  const body = trimmed.slice(ACTION_MARKER.length).trim();

  if (!body.includes('(') && !body.includes(')')) {
    return body.length > 0 ? createCall(body, [], {}) : NO_CALL;
  }

  const open = body.indexOf('(');
  if (open === -1) {
    return NO_CALL;
  }

  const toolName = body.slice(0, open).trim();
  if (toolName.length === 0) {
    return NO_CALL;
  }

  const close = findClosingParen(body, open);
  if (close === -1) {
    return NO_CALL;
  }

  const argText = body.slice(open + 1, close).trim();
  if (argText.length === 0) {
    return createCall(toolName, [], {});
  }

  const positional: Scalar[] = [];
  const keyword = new Map<string, Scalar>();

  for (const token of splitArguments(argText)) {
    const eq = indexOfUnquoted(token, '=');
    const key = eq === -1 ? '' : token.slice(0, eq).trim();

    if (key.length > 0) {
      keyword.set(key, coerceScalar(token.slice(eq + 1).trim()));
    } else {
      positional.push(coerceScalar(token));
    }
  }

  return createCall(toolName, positional, Object.fromEntries(keyword));
}

/**
 * Coerces one argument value.
 *
 * Order: integer, decimal, boolean, null sentinel, quoted string, bare string.
 * Integers past the safe range are kept as `bigint` so no digit is lost.
 */
export function coerceScalar(raw: string): Scalar {
  if (INTEGER_PATTERN.test(raw)) {
    const value = Number.parseInt(raw, 10);
    return { kind: 'int', value: Number.isSafeInteger(value) ? value : BigInt(raw) };
  }
  if (FLOAT_PATTERN.test(raw)) {
    return { kind: 'float', value: Number.parseFloat(raw) };
  }

  const lowered = raw.toLowerCase();
  if (lowered === 'true' || lowered === 'false') {
    return { kind: 'bool', value: lowered === 'true' };
  }
  if (lowered === 'none' || lowered === 'null') {
    return { kind: 'null' };
  }

  if (raw.length >= 2) {
    const first = raw[0];
    const last = raw[raw.length - 1];
    if ((first === '"' || first === "'") && first === last) {
      return { kind: 'string', value: raw.slice(1, -1) };
    }
  }

  return { kind: 'string', value: raw };
}

/**
 * Unwraps a scalar into a plain value.
 */
export function scalarValue(scalar: Scalar): string | number | bigint | boolean | null {
  return scalar.kind === 'null' ? null : scalar.value;
}

/**
 * Renders a scalar back into call syntax, for logs.
 */
export function formatScalar(scalar: Scalar): string {
  switch (scalar.kind) {
    case 'null':
      return 'null';
    case 'string':
      return JSON.stringify(scalar.value);
    default:
      return String(scalar.value);
  }
}

/**
 * Renders a call back into `name(a, b, k=v)` form, for logs.
 */
export function formatCall(call: ParsedCall): string {
  const parts = [
    ...call.positionalArgs.map(formatScalar),
    ...Object.entries(call.keywordArgs).map(([key, value]) => `${key}=${formatScalar(value)}`),
  ];
  return `${call.toolName}(${parts.join(', ')})`;
}

// ============ Private Helpers ============

function createCall(
  toolName: string,
  positionalArgs: Scalar[],
  keywordArgs: Record<string, Scalar>,
): ParsedCall {
  return Object.freeze({
    toolName,
    positionalArgs: Object.freeze(positionalArgs),
    keywordArgs: Object.freeze(keywordArgs),
  });
}

/**
 * Finds the parenthesis that closes the one at `open`, or -1.
 */
function findClosingParen(text: string, open: number): number {
  const quotes = new QuoteState();
  let depth = 1;

  for (let i = open + 1; i < text.length; i++) {
    const char = text[i];
    quotes.feed(char);

    if (quotes.open) continue;

    if (char === '(') {
      depth++;
    } else if (char === ')') {
      depth--;
      if (depth === 0) return i;
    }
  }

  return -1;
}

/**
 * Splits on commas outside quotes. Tokens are trimmed; empty ones dropped.
 */
function splitArguments(text: string): string[] {
  const quotes = new QuoteState();
  const tokens: string[] = [];
  let current = '';

  for (const char of text) {
    quotes.feed(char);
    if (char === ',' && !quotes.open) {
      tokens.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  tokens.push(current);

  return tokens.map((token) => token.trim()).filter((token) => token.length > 0);
}

function indexOfUnquoted(text: string, target: string): number {
  const quotes = new QuoteState();

  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    quotes.feed(char);
    if (char === target && !quotes.open) return i;
  }

  return -1;
}
