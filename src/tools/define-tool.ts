/**
 * @fileoverview Tool definition and argument binding.
 *
 * `defineTool` erases a tool's argument type behind a zod schema so the
 * registry can hold every kind in one map. `bindArguments` maps parsed
 * positional and keyword scalars onto a tool's parameter list.
 *
 * @module sql-audit-agent/tools/define-tool
 * @version 0.1.0
 */

import type { z } from 'zod';
import type { Scalar } from '../types/agent.types.js';
import type { ToolDefinition, ToolParameter, ToolSpec } from '../types/tools.types.js';
import { ArgumentBindingError } from '../errors.js';
import { scalarValue } from '../parser/action-parser.js';

/**
 * Builds a registry-ready tool from a typed spec.
 *
 * @example
 * ```typescript
 * const echo = defineTool({
 *   name: 'echo',
 *   kind: ToolKind.QUERY,
 *   description: 'Echoes its input',
 *   parameters: [{ name: 'text', description: 'Text to echo' }],
 *   schema: z.object({ text: z.string() }),
 *   execute: async ({ text }) => text,
 * });
 * ```
 */
export function defineTool<TSchema extends z.ZodTypeAny>(spec: ToolSpec<TSchema>): ToolDefinition {
  return {
    name: spec.name,
    kind: spec.kind,
    description: spec.description,
    parameters: spec.parameters,
    async run(args) {
      const parsed = spec.schema.safeParse(args);
      if (!parsed.success) {
        throw new ArgumentBindingError(spec.name, formatIssues(parsed.error));
      }
      const output: z.output<TSchema> = parsed.data;
      return spec.execute(output);
    },
  };
}

/**
 * Binds positional then keyword arguments to named parameters.
 *
 * @throws ArgumentBindingError on surplus positionals, unknown keywords or
 * a parameter given twice
 */
export function bindArguments(
  toolName: string,
  parameters: ReadonlyArray<ToolParameter>,
  positional: ReadonlyArray<Scalar>,
  keyword: Readonly<Record<string, Scalar>>,
): Record<string, unknown> {
  if (positional.length > parameters.length) {
    throw new ArgumentBindingError(toolName, [
      `takes ${parameters.length} argument(s) but ${positional.length} were given`,
    ]);
  }

  const bound: Record<string, unknown> = {};
  positional.forEach((scalar, index) => {
    bound[parameters[index].name] = scalarValue(scalar);
  });

  const issues: string[] = [];
  for (const [key, scalar] of Object.entries(keyword)) {
    if (!parameters.some((parameter) => parameter.name === key)) {
      issues.push(`unexpected keyword argument '${key}'`);
    } else if (key in bound) {
      issues.push(`got multiple values for argument '${key}'`);
    } else {
      bound[key] = scalarValue(scalar);
    }
  }

  if (issues.length > 0) {
    throw new ArgumentBindingError(toolName, issues);
  }

  return bound;
}

/**
 * Renders the call signature shown to the model, e.g. `generate_report(user_id, analysis)`.
 */
export function formatSignature(tool: ToolDefinition): string {
  const names = tool.parameters.map((parameter) =>
    parameter.optional === true ? `${parameter.name}?` : parameter.name,
  );
  return `${tool.name}(${names.join(', ')})`;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
}
