/**
 * @fileoverview Step Reporter - the ordered event stream of a run.
 *
 * Every recorded step produces a `step` event and every run ends with one
 * `final` event. Events are appended in order and never changed afterwards;
 * sinks render them as they arrive.
 *
 * @module sql-audit-agent/agent/step-reporter
 * @version 0.1.0
 */

import { EventEmitter } from 'eventemitter3';
import type { StepRecord, ToolResult } from '../types/agent.types.js';
import { MAX_STEPS_ANSWER } from '../types/agent.types.js';

export const STEP_JSON_PREFIX = 'STEP_JSON:';

export interface StepEvent {
  readonly type: 'step';
  readonly step: number;
  readonly thought: string;
  readonly tools: ReadonlyArray<ToolResult>;
}

export interface AnswerEvent {
  readonly type: 'final';
  readonly thought: string;
  readonly answer: string;
  readonly steps: ReadonlyArray<StepRecord>;
}

/**
 * Final event of a run that ran out of steps. Carries no thought.
 */
export interface ExhaustedEvent {
  readonly type: 'final';
  readonly answer: typeof MAX_STEPS_ANSWER;
  readonly steps: ReadonlyArray<StepRecord>;
}

export type ReportEvent = StepEvent | AnswerEvent | ExhaustedEvent;

/**
 * Something that renders report events.
 */
export interface ReportSink {
  write(event: ReportEvent): void;
}

export interface StepReporterEvents {
  event: (event: ReportEvent) => void;
}

/**
 * Append-only event log with sink fan-out.
 *
 * @example
 * ```typescript
 * const reporter = new StepReporter([new StructuredSink()]);
 * reporter.on('event', (event) => ui.render(event));
 * ```
 */
export class StepReporter extends EventEmitter<StepReporterEvents> {
  private readonly events: ReportEvent[] = [];
  private readonly sinks: ReadonlyArray<ReportSink>;

  constructor(sinks: ReadonlyArray<ReportSink> = []) {
    super();
    this.sinks = sinks;
  }

  reportStep(record: StepRecord): void {
    this.publish({ type: 'step', step: record.step, thought: record.thought, tools: [...record.tools] });
  }

  reportFinal(thought: string, answer: string, steps: ReadonlyArray<StepRecord>): void {
    this.publish({ type: 'final', thought, answer, steps: [...steps] });
  }

  reportExhausted(steps: ReadonlyArray<StepRecord>): void {
    this.publish({ type: 'final', answer: MAX_STEPS_ANSWER, steps: [...steps] });
  }

  /**
   * Returns every event so far, oldest first. The array is a copy.
   */
  getEvents(): ReadonlyArray<ReportEvent> {
    return [...this.events];
  }

  private publish(event: ReportEvent): void {
    const frozen = Object.freeze(event);
    this.events.push(frozen);
    for (const sink of this.sinks) {
      sink.write(frozen);
    }
    this.emit('event', frozen);
  }
}

export type LineWriter = (text: string) => void;

const writeStdout: LineWriter = (text) => {
  process.stdout.write(text);
};

/**
 * Writes one `STEP_JSON:` line per event, for a UI reading stdout.
 */
export class StructuredSink implements ReportSink {
  constructor(private readonly output: LineWriter = writeStdout) {}

  write(event: ReportEvent): void {
    this.output(`${STEP_JSON_PREFIX}${JSON.stringify(event)}\n`);
  }
}

/**
 * Prints the final answer for a person at a terminal. Steps are silent.
 */
export class TerminalSink implements ReportSink {
  constructor(private readonly output: LineWriter = writeStdout) {}

  write(event: ReportEvent): void {
    if (event.type !== 'final') {
      return;
    }
    this.output(`\nFINAL ANALYSIS:\n${event.answer}\n\n`);
    this.output(`${'='.repeat(70)}\n`);
  }
}

/**
 * Keeps events in memory.
 */
export class MemorySink implements ReportSink {
  private readonly events: ReportEvent[] = [];

  write(event: ReportEvent): void {
    this.events.push(event);
  }

  getEvents(): ReadonlyArray<ReportEvent> {
    return [...this.events];
  }

  clear(): void {
    this.events.length = 0;
  }
}

/**
 * Parses one line of structured output. Returns null for lines that do not
 * carry the prefix or hold invalid JSON.
 */
export function parseStructuredLine(line: string): unknown {
  if (!line.startsWith(STEP_JSON_PREFIX)) {
    return null;
  }
  try {
    return JSON.parse(line.slice(STEP_JSON_PREFIX.length));
  } catch {
    return null;
  }
}
