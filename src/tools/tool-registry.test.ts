/**
 * @fileoverview Unit tests for ToolRegistry
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { z } from 'zod';
import { ToolRegistry } from './tool-registry.js';
import { bindArguments, defineTool, formatSignature } from './define-tool.js';
import { ToolKind, type Scalar, type ToolInvocationRecord } from '../types/index.js';
import { ArgumentBindingError } from '../errors.js';
import { isParsedCall, parseActionLine } from '../parser/action-parser.js';

const str = (value: string): Scalar => ({ kind: 'string', value });

describe('ToolRegistry', () => {
  const echoTool = defineTool({
    name: 'echo',
    kind: ToolKind.QUERY,
    description: 'Echoes back the input message',
    parameters: [
      { name: 'message', description: 'Text to echo' },
      { name: 'times', description: 'Repetitions', optional: true },
    ],
    schema: z.object({ message: z.string(), times: z.number().int().optional() }),
    execute: async ({ message, times }) => message.repeat(times ?? 1),
  });

  const brokenTool = defineTool({
    name: 'broken',
    kind: ToolKind.ALERT,
    description: 'Always throws',
    parameters: [],
    schema: z.object({}),
    execute: async () => {
      throw new Error('disk on fire');
    },
  });

  let registry: ToolRegistry;

  beforeEach(() => {
    registry = new ToolRegistry([echoTool, brokenTool]);
  });

  describe('construction', () => {
    it('should reject duplicate names', () => {
      expect(() => new ToolRegistry([echoTool, echoTool])).toThrow(
        "Tool with name 'echo' is already registered",
      );
    });
  });

  describe('lookup()', () => {
    it('should find registered tools', () => {
      const result = registry.lookup('echo');

      expect(result.found).toBe(true);
    });

    it('should report missing tools without throwing', () => {
      expect(registry.lookup('nope')).toEqual({ found: false, name: 'nope' });
    });
  });

  describe('list()', () => {
    it('should list in registration order and filter by kind', () => {
      expect(registry.list().map((tool) => tool.name)).toEqual(['echo', 'broken']);
      expect(registry.list(ToolKind.ALERT).map((tool) => tool.name)).toEqual(['broken']);
    });
  });

  describe('execute()', () => {
    it('should run a tool with positional arguments', async () => {
      await expect(registry.execute('echo', [str('hi'), { kind: 'int', value: 2 }])).resolves.toBe('hihi');
    });

    it('should run a tool with keyword arguments', async () => {
      await expect(registry.execute('echo', [], { message: str('yo') })).resolves.toBe('yo');
    });

    it('should return an error string naming an unknown tool', async () => {
      const result = await registry.execute('drop_everything');

      expect(result).toBe("Error: unknown tool 'drop_everything'");
    });

    it('should turn a thrown error into text tagged with the tool name', async () => {
      const failed = vi.fn();
      registry.on('tool:failed', failed);

      const result = await registry.execute('broken');

      expect(result).toBe('Error executing broken: disk on fire');
      expect(failed).toHaveBeenCalledTimes(1);
      expect(failed.mock.calls[0][1]).toBe('disk on fire');
    });

    it('should report wrong argument shapes as binding errors', async () => {
      const result = await registry.execute('echo', [{ kind: 'bool', value: true }]);

      expect(result).toBe('Error executing echo: message: Expected string, received boolean');
    });

    it('should report missing required arguments', async () => {
      const result = await registry.execute('echo');

      expect(result).toBe('Error executing echo: message: Required');
    });

    it('should emit invoked and completed events', async () => {
      const invoked = vi.fn();
      const completed = vi.fn<[ToolInvocationRecord], void>();
      registry.on('tool:invoked', invoked);
      registry.on('tool:completed', completed);

      await registry.execute('echo', [str('x')]);

      expect(invoked).toHaveBeenCalledWith('echo', expect.any(String));
      expect(completed.mock.calls[0][0].toolName).toBe('echo');
      expect(completed.mock.calls[0][0].success).toBe(true);
    });
  });
});

describe('bindArguments', () => {
  const parameters = [
    { name: 'user_id', description: 'User' },
    { name: 'reason', description: 'Why' },
  ];

  it('should bind positionals then keywords', () => {
    expect(
      bindArguments('t', parameters, [{ kind: 'int', value: 7 }], { reason: str('odd hours') }),
    ).toEqual({ user_id: 7, reason: 'odd hours' });
  });

  it('should report a __proto__ keyword as unexpected', () => {
    const call = parseActionLine('ACTION: t(u1, __proto__=1)');
    if (!isParsedCall(call)) throw new Error('expected a call');

    expect(() => bindArguments('t', parameters, call.positionalArgs, call.keywordArgs)).toThrow(
      "unexpected keyword argument '__proto__'",
    );
  });

  it('should unwrap null scalars', () => {
    expect(bindArguments('t', parameters, [], { reason: { kind: 'null' } })).toEqual({ reason: null });
  });

  it('should reject surplus positionals', () => {
    expect(() => bindArguments('t', parameters, [str('a'), str('b'), str('c')], {})).toThrow(
      'takes 2 argument(s) but 3 were given',
    );
  });

  it('should reject unknown and duplicated keywords together', () => {
    let caught: unknown;
    try {
      bindArguments('t', parameters, [str('u1')], { user_id: str('u2'), color: str('red') });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ArgumentBindingError);
    if (caught instanceof ArgumentBindingError) {
      expect(caught.issues).toEqual([
        "got multiple values for argument 'user_id'",
        "unexpected keyword argument 'color'",
      ]);
    }
  });
});

describe('formatSignature', () => {
  it('should mark optional parameters', () => {
    const tool = defineTool({
      name: 'send',
      kind: ToolKind.EMAIL,
      description: 'Sends',
      parameters: [
        { name: 'to', description: 'Recipient' },
        { name: 'html', description: 'Body', optional: true },
      ],
      schema: z.object({}),
      execute: async () => 'ok',
    });

    expect(formatSignature(tool)).toBe('send(to, html?)');
  });
});
