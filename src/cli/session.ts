/**
 * @fileoverview Wiring and session handling for the command line.
 *
 * `createAgent` assembles the production object graph from a config.
 * Every collaborator can be swapped, which is how the tests and the
 * offline example run without a database, mail server or model.
 *
 * @module sql-audit-agent/cli/session
 */

import type { AuditConfig } from '../config/index.js';
import { ConversationLoop } from '../agent/conversation-loop.js';
import { StepReporter, StructuredSink, TerminalSink } from '../agent/step-reporter.js';
import type { LineWriter, ReportSink } from '../agent/step-reporter.js';
import { buildSystemPrompt } from '../agent/prompt.js';
import { ToolRegistry } from '../tools/tool-registry.js';
import { createAuditTools } from '../tools/index.js';
import { formatSignature } from '../tools/define-tool.js';
import { PgSqlClient } from '../tools/sql-client.js';
import type { SqlClient } from '../tools/sql-client.js';
import { createSmtpTransport } from '../tools/mailer.js';
import type { MailTransport } from '../tools/mailer.js';
import { createModelBackend } from '../providers/index.js';
import type { ModelBackend } from '../providers/base.js';
import { ConsoleTransport, Logger } from '../observability/logger.js';
import { Severity } from '../types/core.types.js';
import { describeError } from '../errors.js';

export const QUIT_WORDS: ReadonlySet<string> = new Set(['quit', 'exit', 'q']);

export function isQuitWord(line: string): boolean {
  return QUIT_WORDS.has(line.trim().toLowerCase());
}

export interface AgentOptions {
  /** STEP_JSON lines instead of terminal output */
  readonly structured: boolean;
  readonly maxSteps?: number | undefined;
  readonly verbose?: boolean | undefined;
}

/**
 * Collaborators that replace the production ones.
 */
export interface AgentOverrides {
  readonly model?: ModelBackend;
  readonly sql?: SqlClient;
  readonly mailer?: MailTransport;
  readonly logger?: Logger;
  readonly output?: LineWriter;
}

export interface Agent {
  readonly loop: ConversationLoop;
  readonly registry: ToolRegistry;
  readonly reporter: StepReporter;
  readonly logger: Logger;
}

function createCliLogger(config: AuditConfig, verbose: boolean | undefined): Logger {
  return new Logger({
    module: 'audit-agent',
    minLevel: verbose === true ? Severity.DEBUG : config.logLevel,
    transports: [new ConsoleTransport()],
  });
}

/**
 * Builds the registry of audit tools without a model backend.
 */
export function createToolRegistry(
  config: AuditConfig,
  logger: Logger,
  overrides: Pick<AgentOverrides, 'sql' | 'mailer'> = {},
): ToolRegistry {
  return new ToolRegistry(
    createAuditTools({
      sql: overrides.sql ?? new PgSqlClient(config.database),
      mailer: overrides.mailer ?? createSmtpTransport(config.smtp),
      outputDir: config.outputDir,
      sender: config.smtp.user,
    }),
    logger.child({ module: 'tools.registry' }),
  );
}

/**
 * Builds a ready-to-run agent.
 */
export function createAgent(config: AuditConfig, options: AgentOptions, overrides: AgentOverrides = {}): Agent {
  const logger = overrides.logger ?? createCliLogger(config, options.verbose);
  const registry = createToolRegistry(config, logger, overrides);

  const sink: ReportSink = options.structured
    ? new StructuredSink(overrides.output)
    : new TerminalSink(overrides.output);
  const reporter = new StepReporter([sink]);

  const loop = new ConversationLoop({
    model: overrides.model ?? createModelBackend(config.model),
    registry,
    reporter,
    systemPrompt: buildSystemPrompt(registry, { recipient: config.alertRecipient }),
    maxSteps: options.maxSteps ?? config.maxSteps,
    maxActionsPerStep: config.maxActionsPerStep,
    logger: logger.child({ module: 'agent.loop' }),
  });

  return { loop, registry, reporter, logger };
}

/**
 * Returns the first non-blank line that is not a quit word, or null.
 */
export async function readQuestion(lines: AsyncIterable<string>): Promise<string | null> {
  for await (const raw of lines) {
    const line = raw.trim();
    if (line.length > 0 && !isQuitWord(line)) {
      return line;
    }
  }
  return null;
}

/**
 * Lists the audit tools. Needs no API key.
 */
export function describeTools(
  config: AuditConfig,
  options: Pick<AgentOptions, 'verbose'>,
  overrides: Pick<AgentOverrides, 'sql' | 'mailer' | 'logger'> = {},
): string {
  const registry = createToolRegistry(config, overrides.logger ?? createCliLogger(config, options.verbose), overrides);
  const tools = registry.list();

  const blocks = tools.map(
    (tool) => `  ${formatSignature(tool)}\n     ${tool.description}\n     Kind: ${tool.kind}\n`,
  );
  return `${blocks.join('\n')}\nTotal: ${tools.length} tools\n`;
}

export interface SessionIO {
  write(text: string): void;

  /** Shows the `You: ` prompt */
  prompt(): void;
}

/**
 * Answers questions until a quit word or end of input. A failed run is
 * printed and the session goes on.
 */
export async function runInteractive(
  lines: AsyncIterable<string>,
  loop: ConversationLoop,
  io: SessionIO,
): Promise<void> {
  io.prompt();
  for await (const raw of lines) {
    const line = raw.trim();

    if (isQuitWord(line)) {
      io.write('\nGoodbye!\n');
      return;
    }

    if (line.length > 0) {
      try {
        await loop.run(line);
      } catch (error) {
        io.write(`\nError: ${describeError(error)}\n\n`);
      }
    }
    io.prompt();
  }
}

export function formatBanner(): string {
  return [
    'SQL AUDIT AGENT (AUTONOMOUS, SQL-FIRST)',
    '='.repeat(70),
    '',
    'INTERACTIVE MODE - Ask anything about the audit logs.',
    'Type "quit" to exit.',
    '',
    '',
  ].join('\n');
}
