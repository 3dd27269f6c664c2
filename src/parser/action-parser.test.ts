/**
 * @fileoverview Unit tests for the action-call parser
 */

import { describe, it, expect } from 'vitest';
import {
  NO_CALL,
  coerceScalar,
  extractActionLines,
  formatCall,
  isParsedCall,
  parseActionLine,
  scalarValue,
} from './action-parser.js';

describe('parseActionLine', () => {
  describe('well-formed calls', () => {
    it('should split positional and keyword arguments with coercion', () => {
      const result = parseActionLine('ACTION: lookup(42, 3.5, k=true)');

      expect(result.toolName).toBe('lookup');
      expect(result.positionalArgs).toEqual([
        { kind: 'int', value: 42 },
        { kind: 'float', value: 3.5 },
      ]);
      expect(result.keywordArgs).toEqual({ k: { kind: 'bool', value: true } });
    });

    it('should keep a quoted comma inside a single string', () => {
      const result = parseActionLine("ACTION: tag('x,y')");

      expect(result.positionalArgs).toEqual([{ kind: 'string', value: 'x,y' }]);
    });

    it('should let double quotes protect an embedded single quote', () => {
      const result = parseActionLine('ACTION: note(x="it\'s fine")');

      expect(result.keywordArgs).toEqual({ x: { kind: 'string', value: "it's fine" } });
    });

    it('should coerce none to null', () => {
      const result = parseActionLine('ACTION: send(body_html=none)');

      expect(result.keywordArgs).toEqual({ body_html: { kind: 'null' } });
    });

    it('should accept leading whitespace before the marker', () => {
      const result = parseActionLine('   ACTION: list_tables()');

      expect(result.toolName).toBe('list_tables');
    });

    it('should ignore parentheses and equals signs inside quotes', () => {
      const result = parseActionLine(
        `ACTION: query_postgres(query="SELECT COUNT(*) FROM audit_events WHERE status='FAILURE' LIMIT 5")`,
      );

      expect(result.toolName).toBe('query_postgres');
      expect(result.positionalArgs).toEqual([]);
      expect(result.keywordArgs).toEqual({
        query: {
          kind: 'string',
          value: "SELECT COUNT(*) FROM audit_events WHERE status='FAILURE' LIMIT 5",
        },
      });
    });

    it('should treat a quoted equals sign as part of a positional value', () => {
      const result = parseActionLine('ACTION: echo("a=b")');

      expect(result.positionalArgs).toEqual([{ kind: 'string', value: 'a=b' }]);
      expect(result.keywordArgs).toEqual({});
    });

    it('should let the last duplicate keyword win', () => {
      const result = parseActionLine('ACTION: f(a=1, a=2)');

      expect(result.keywordArgs).toEqual({ a: { kind: 'int', value: 2 } });
    });

    it('should keep a __proto__ keyword as an ordinary entry', () => {
      const result = parseActionLine('ACTION: f(__proto__=1, a=2)');
      if (!isParsedCall(result)) throw new Error('expected a call');

      expect(Object.keys(result.keywordArgs)).toEqual(['__proto__', 'a']);
      expect(Object.getPrototypeOf(result.keywordArgs)).toBe(Object.prototype);
    });

    it('should keep positional order when keywords are interleaved', () => {
      const result = parseActionLine('ACTION: f(first, k=v, second)');

      expect(result.positionalArgs).toEqual([
        { kind: 'string', value: 'first' },
        { kind: 'string', value: 'second' },
      ]);
      expect(result.keywordArgs).toEqual({ k: { kind: 'string', value: 'v' } });
    });

    it('should allow balanced nested parentheses', () => {
      const result = parseActionLine('ACTION: f((a)) trailing text');

      expect(result.toolName).toBe('f');
      expect(result.positionalArgs).toEqual([{ kind: 'string', value: '(a)' }]);
    });
  });

  describe('zero-argument calls', () => {
    it('should parse empty parentheses', () => {
      expect(parseActionLine('ACTION: list_tables()')).toEqual({
        toolName: 'list_tables',
        positionalArgs: [],
        keywordArgs: {},
      });
    });

    it('should parse a bare tool name', () => {
      expect(parseActionLine('ACTION: list_tables')).toEqual({
        toolName: 'list_tables',
        positionalArgs: [],
        keywordArgs: {},
      });
    });

    it('should treat whitespace-only arguments as none', () => {
      expect(parseActionLine('ACTION: list_tables(   )').positionalArgs).toEqual([]);
    });
  });

  describe('malformed lines', () => {
    it('should return the null triple for unbalanced parentheses', () => {
      expect(parseActionLine('ACTION: NAME(a, b')).toEqual(NO_CALL);
    });

    it('should return the null triple when a quote never closes', () => {
      expect(parseActionLine('ACTION: NAME("a, b)')).toEqual(NO_CALL);
    });

    it('should return the null triple for lines without the marker', () => {
      expect(parseActionLine('Thought: ACTION: maybe later')).toEqual(NO_CALL);
    });

    it('should return the null triple for an empty tool name', () => {
      expect(parseActionLine('ACTION:')).toEqual(NO_CALL);
      expect(parseActionLine('ACTION: (a)')).toEqual(NO_CALL);
    });

    it('should return the null triple for a stray closing parenthesis', () => {
      expect(parseActionLine('ACTION: name)')).toEqual(NO_CALL);
    });
  });

  it('isParsedCall should narrow results', () => {
    expect(isParsedCall(parseActionLine('ACTION: x'))).toBe(true);
    expect(isParsedCall(parseActionLine('nothing'))).toBe(false);
  });
});

describe('coerceScalar', () => {
  it('should follow the fixed coercion order', () => {
    expect(coerceScalar('7')).toEqual({ kind: 'int', value: 7 });
    expect(coerceScalar('0.25')).toEqual({ kind: 'float', value: 0.25 });
    expect(coerceScalar('FALSE')).toEqual({ kind: 'bool', value: false });
    expect(coerceScalar('Null')).toEqual({ kind: 'null' });
    expect(coerceScalar('"7"')).toEqual({ kind: 'string', value: '7' });
    expect(coerceScalar('HIGH')).toEqual({ kind: 'string', value: 'HIGH' });
  });

  it('should keep every digit of integers beyond the safe range', () => {
    expect(coerceScalar('9007199254740991')).toEqual({ kind: 'int', value: 9007199254740991 });
    expect(coerceScalar('12345678901234567890')).toEqual({ kind: 'int', value: 12345678901234567890n });
    expect(parseActionLine('ACTION: f(12345678901234567890)').positionalArgs).toEqual([
      { kind: 'int', value: 12345678901234567890n },
    ]);
  });

  it('should leave signed and partial numbers as strings', () => {
    expect(coerceScalar('-5')).toEqual({ kind: 'string', value: '-5' });
    expect(coerceScalar('1.2.3')).toEqual({ kind: 'string', value: '1.2.3' });
  });

  it('should not strip mismatched quotes', () => {
    expect(coerceScalar(`'abc"`)).toEqual({ kind: 'string', value: `'abc"` });
  });
});

describe('extractActionLines', () => {
  it('should keep only action lines in order', () => {
    const reply = 'Thought: go\nACTION: a()\nsome prose\n  ACTION: b(1)\n';

    expect(extractActionLines(reply)).toEqual(['ACTION: a()', '  ACTION: b(1)']);
  });
});

describe('helpers', () => {
  it('scalarValue should unwrap each kind', () => {
    expect(scalarValue({ kind: 'null' })).toBeNull();
    expect(scalarValue({ kind: 'int', value: 3 })).toBe(3);
    expect(scalarValue({ kind: 'int', value: 12345678901234567890n })).toBe(12345678901234567890n);
  });

  it('formatCall should render a call for logs', () => {
    const call = parseActionLine("ACTION: f(1, 'x', k=none)");
    if (!isParsedCall(call)) throw new Error('expected a call');

    expect(formatCall(call)).toBe('f(1, "x", k=null)');
  });

  it('formatCall should print long integers digit for digit', () => {
    const call = parseActionLine('ACTION: f(12345678901234567890)');
    if (!isParsedCall(call)) throw new Error('expected a call');

    expect(formatCall(call)).toBe('f(12345678901234567890)');
  });
});
