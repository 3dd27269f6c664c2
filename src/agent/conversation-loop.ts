/**
 * @fileoverview Conversation Loop - the agent's execution engine.
 *
 * Each step sends the whole transcript to the model and classifies the
 * reply:
 *
 * - a final answer with no action marker ends the run;
 * - otherwise the reply's action lines (bounded per step) are parsed and
 *   dispatched, and their observations go back to the model;
 * - a reply that yields no tool call, or mixes both markers, gets a
 *   corrective prompt instead.
 *
 * The run also ends after a fixed number of steps. Nothing the model or a
 * tool does can raise out of a run; only a failing model backend can.
 *
 * @module sql-audit-agent/agent/conversation-loop
 * @version 0.1.0
 */

import { EventEmitter } from 'eventemitter3';
import { v4 as uuidv4 } from 'uuid';
import type { UniqueId } from '../types/core.types.js';
import { LoopPhase, createUniqueId } from '../types/core.types.js';
import type { RunOutcome, StepRecord, ToolResult } from '../types/agent.types.js';
import { MAX_STEPS_ANSWER } from '../types/agent.types.js';
import { ACTION_MARKER, extractActionLines, isParsedCall, parseActionLine } from '../parser/action-parser.js';
import type { ToolRegistry } from '../tools/tool-registry.js';
import type { ModelBackend } from '../providers/base.js';
import type { Logger } from '../observability/logger.js';
import { createSilentLogger } from '../observability/logger.js';
import { describeError } from '../errors.js';
import { createLifecycle } from './lifecycle.js';
import { Transcript } from './transcript.js';
import type { StepReporter } from './step-reporter.js';

export const FINAL_MARKER = 'FINAL ANSWER:';

const THOUGHT_PREFIX = 'thought:';

/** Text an interactive shell may leave behind in a model's answer */
const SHELL_ARTIFACTS: ReadonlyArray<string> = ['You: quit', 'Goodbye!'];

export const CORRECTIVE_PROMPT = 'Please use ACTION: tool_name(arguments) or provide your FINAL ANSWER:';

export const DEFAULT_MAX_STEPS = 20;
export const DEFAULT_MAX_ACTIONS_PER_STEP = 5;

/**
 * Events emitted by the conversation loop.
 */
export interface ConversationLoopEvents {
  'loop:start': (runId: UniqueId, question: string) => void;
  'loop:step': (runId: UniqueId, record: StepRecord) => void;
  'loop:complete': (runId: UniqueId, outcome: RunOutcome) => void;
  'loop:failed': (runId: UniqueId, reason: string) => void;
}

export interface ConversationLoopConfig {
  readonly model: ModelBackend;
  readonly registry: ToolRegistry;
  readonly reporter: StepReporter;
  readonly systemPrompt: string;
  readonly maxSteps?: number | undefined;
  readonly maxActionsPerStep?: number | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * How a reply is handled.
 */
export type ReplyKind = 'final' | 'actions' | 'mixed' | 'none';

/**
 * Returns the text of the first `Thought:` line (any case), or ''.
 */
export function extractThought(reply: string): string {
  for (const line of reply.split('\n')) {
    const trimmed = line.trim();
    if (trimmed.toLowerCase().startsWith(THOUGHT_PREFIX)) {
      return trimmed.slice(THOUGHT_PREFIX.length).trim();
    }
  }
  return '';
}

/**
 * Returns the text after the last final-answer marker, without shell
 * artifacts.
 */
export function extractFinalAnswer(reply: string): string {
  const start = reply.lastIndexOf(FINAL_MARKER);
  let answer = (start === -1 ? reply : reply.slice(start + FINAL_MARKER.length)).trim();
  for (const artifact of SHELL_ARTIFACTS) {
    answer = answer.split(artifact).join('');
  }
  return answer.trim();
}

/**
 * Classifies a reply by its markers. Markers count anywhere in the text.
 */
export function classifyReply(reply: string): ReplyKind {
  const hasFinal = reply.includes(FINAL_MARKER);
  const hasAction = reply.includes(ACTION_MARKER);

  if (hasFinal) {
    return hasAction ? 'mixed' : 'final';
  }
  return hasAction ? 'actions' : 'none';
}

/**
 * Formats one observation for the model.
 */
export function formatObservation(result: ToolResult): string {
  return `Tool: ${result.tool}\nResult: ${result.result}`;
}

/**
 * Builds the user turn that feeds a step's observations back.
 */
export function buildObservationPrompt(results: ReadonlyArray<ToolResult>): string {
  return (
    `OBSERVATIONS:\n${results.map(formatObservation).join('\n\n')}\n\n` +
    'Based on these observations, what is your next step? ' +
    'If done, provide FINAL ANSWER. Do NOT include ACTION lines if concluding.'
  );
}

/**
 * Drives one model conversation per `run` call.
 *
 * A loop instance holds no per-run state, so it can serve one question
 * after another.
 *
 * @example
 * ```typescript
 * const loop = new ConversationLoop({ model, registry, reporter, systemPrompt });
 * const outcome = await loop.run('Are there suspicious users?');
 * if (outcome.status === 'final') console.log(outcome.answer);
 * ```
 */
export class ConversationLoop extends EventEmitter<ConversationLoopEvents> {
  private readonly model: ModelBackend;
  private readonly registry: ToolRegistry;
  private readonly reporter: StepReporter;
  private readonly systemPrompt: string;
  private readonly maxSteps: number;
  private readonly maxActionsPerStep: number;
  private readonly logger: Logger;

  constructor(config: ConversationLoopConfig) {
    super();
    this.model = config.model;
    this.registry = config.registry;
    this.reporter = config.reporter;
    this.systemPrompt = config.systemPrompt;
    this.maxSteps = config.maxSteps ?? DEFAULT_MAX_STEPS;
    this.maxActionsPerStep = config.maxActionsPerStep ?? DEFAULT_MAX_ACTIONS_PER_STEP;
    this.logger = config.logger ?? createSilentLogger('agent.loop');
  }

  /**
   * Runs the conversation for one question.
   *
   * @throws whatever the model backend throws; the run is marked failed first
   */
  async run(question: string): Promise<RunOutcome> {
    const runId = createUniqueId(uuidv4());
    const lifecycle = createLifecycle(runId);
    const log = this.logger.child({ correlationId: runId });
    const transcript = new Transcript(this.systemPrompt);
    const steps: StepRecord[] = [];

    lifecycle.on('transition', (from, to, reason) => {
      log.debug('Phase change', { from, to, reason, step: lifecycle.getStepNumber() });
    });

    transcript.append('user', question);
    this.emit('loop:start', runId, question);
    log.info('Run started', { maxSteps: this.maxSteps, maxActionsPerStep: this.maxActionsPerStep });

    for (let step = 1; step <= this.maxSteps; step++) {
      let reply: string;
      try {
        reply = await log.time(`Model call (step ${step})`, () => this.model.complete(transcript.snapshot()));
      } catch (error) {
        const reason = describeError(error);
        lifecycle.fail(reason);
        this.emit('loop:failed', runId, reason);
        throw error;
      }

      const thought = extractThought(reply);
      const kind = classifyReply(reply);

      if (kind === 'final') {
        lifecycle.transition(LoopPhase.FINAL_FOUND, 'Final answer without actions');
        const answer = extractFinalAnswer(reply);
        this.reporter.reportFinal(thought, answer, steps);
        lifecycle.terminate('Answered');

        const outcome: RunOutcome = { status: 'final', thought, answer, steps: [...steps] };
        log.info('Run answered', { steps: steps.length });
        this.emit('loop:complete', runId, outcome);
        return outcome;
      }

      const tools = kind === 'actions' ? await this.dispatch(reply, log) : [];
      lifecycle.transition(
        tools.length > 0 ? LoopPhase.ACTIONS_FOUND : LoopPhase.NEITHER,
        kind === 'mixed' ? 'Final answer mixed with actions' : `${tools.length} tool call(s)`,
      );

      const record: StepRecord = { step, thought, tools };
      steps.push(record);
      this.reporter.reportStep(record);
      this.emit('loop:step', runId, record);
      log.info('Step finished', { step, kind, tools: tools.map((result) => result.tool) });

      transcript.append('assistant', reply);
      transcript.append('user', tools.length > 0 ? buildObservationPrompt(tools) : CORRECTIVE_PROMPT);

      if (step < this.maxSteps) {
        lifecycle.transition(LoopPhase.AWAITING_MODEL, 'Next step');
      }
    }

    lifecycle.terminate('Step budget spent');
    this.reporter.reportExhausted(steps);
    log.warn('Run hit the step limit', { maxSteps: this.maxSteps });

    const outcome: RunOutcome = { status: 'max_steps', answer: MAX_STEPS_ANSWER, steps: [...steps] };
    this.emit('loop:complete', runId, outcome);
    return outcome;
  }

  /**
   * Parses and executes the first action lines of a reply, in order.
   * Every considered line uses a slot, including lines that fail to parse.
   */
  private async dispatch(reply: string, log: Logger): Promise<ToolResult[]> {
    const lines = extractActionLines(reply);
    const considered = lines.slice(0, this.maxActionsPerStep);
    const results: ToolResult[] = [];

    if (lines.length > considered.length) {
      log.warn('Action lines over the per-step limit ignored', {
        ignored: lines.length - considered.length,
      });
    }

    for (const line of considered) {
      const call = parseActionLine(line);
      if (!isParsedCall(call)) {
        log.debug('Unparsable action line dropped', { line });
        continue;
      }
      const result = await this.registry.execute(call.toolName, call.positionalArgs, call.keywordArgs);
      results.push({ tool: call.toolName, result });
    }

    return results;
  }
}
