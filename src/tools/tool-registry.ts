/**
 * @fileoverview Tool Registry - name lookup and failure-isolated dispatch.
 *
 * The registry is built once from a fixed set of tool definitions. It maps
 * a name to a tool, binds parsed arguments, and runs the tool. Whatever
 * happens, `execute` answers with a string: unknown names, bad arguments and
 * thrown errors all become observation text the model can react to.
 *
 * @module sql-audit-agent/tools/tool-registry
 * @version 0.1.0
 */

import { v4 as uuidv4 } from 'uuid';
import { EventEmitter } from 'eventemitter3';
import type { UniqueId } from '../types/core.types.js';
import { createUniqueId } from '../types/core.types.js';
import type { Scalar } from '../types/agent.types.js';
import type {
  ToolDefinition,
  ToolInvocationRecord,
  ToolKind,
  ToolLookup,
} from '../types/tools.types.js';
import type { Logger } from '../observability/logger.js';
import { createSilentLogger } from '../observability/logger.js';
import { describeError } from '../errors.js';
import { bindArguments } from './define-tool.js';

/**
 * Events emitted by the Tool Registry.
 */
export interface ToolRegistryEvents {
  'tool:invoked': (toolName: string, executionId: UniqueId) => void;
  'tool:completed': (record: ToolInvocationRecord) => void;
  'tool:failed': (record: ToolInvocationRecord, message: string) => void;
  'tool:unknown': (toolName: string) => void;
}

/**
 * Central registry for the agent's tools.
 *
 * @example
 * ```typescript
 * const registry = new ToolRegistry(createAuditTools(deps), logger);
 * const text = await registry.execute('get_table_schema', [{ kind: 'string', value: 'users' }], {});
 * ```
 */
export class ToolRegistry extends EventEmitter<ToolRegistryEvents> {
  private readonly tools: ReadonlyMap<string, ToolDefinition>;
  private readonly logger: Logger;

  /**
   * @throws Error if two definitions share a name
   */
  constructor(definitions: ReadonlyArray<ToolDefinition>, logger?: Logger) {
    super();
    const tools = new Map<string, ToolDefinition>();

    for (const definition of definitions) {
      if (tools.has(definition.name)) {
        throw new Error(`Tool with name '${definition.name}' is already registered`);
      }
      tools.set(definition.name, definition);
    }

    this.tools = tools;
    this.logger = logger ?? createSilentLogger('tools.registry');
  }

  /**
   * Looks a tool up by name.
   */
  lookup(name: string): ToolLookup {
    const tool = this.tools.get(name);
    return tool ? { found: true, tool } : { found: false, name };
  }

  /**
   * Lists registered tools in registration order.
   *
   * @param kind - Optional kind filter
   */
  list(kind?: ToolKind): ReadonlyArray<ToolDefinition> {
    const definitions = [...this.tools.values()];
    return kind === undefined ? definitions : definitions.filter((tool) => tool.kind === kind);
  }

  /**
   * Runs a tool and returns its result text. Never rejects.
   */
  async execute(
    name: string,
    positional: ReadonlyArray<Scalar> = [],
    keyword: Readonly<Record<string, Scalar>> = {},
  ): Promise<string> {
    const lookup = this.lookup(name);

    if (!lookup.found) {
      this.logger.warn('Unknown tool requested', { tool: name });
      this.emit('tool:unknown', name);
      return `Error: unknown tool '${name}'`;
    }

    const executionId = createUniqueId(uuidv4());
    const startTime = Date.now();
    this.emit('tool:invoked', name, executionId);
    this.logger.debug('Invoking tool', { tool: name, executionId });

    try {
      const args = bindArguments(name, lookup.tool.parameters, positional, keyword);
      const result = await lookup.tool.run(args);

      const record = { executionId, toolName: name, durationMs: Date.now() - startTime, success: true };
      this.emit('tool:completed', record);
      this.logger.info('Tool completed', { tool: name, durationMs: record.durationMs });

      return result;
    } catch (error) {
      const message = describeError(error);
      const record = { executionId, toolName: name, durationMs: Date.now() - startTime, success: false };
      this.emit('tool:failed', record, message);
      this.logger.warn('Tool failed', { tool: name, error: message });

      return `Error executing ${name}: ${message}`;
    }
  }
}
