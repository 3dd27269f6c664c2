/**
 * @fileoverview Agent module public exports.
 *
 * @module sql-audit-agent/agent
 * @version 0.1.0
 */

export {
  LifecycleController,
  createLifecycle,
  type LifecycleEvents,
  type PhaseMetadata,
  type LifecycleError,
  type LifecycleState,
  type PhaseHistoryEntry,
} from './lifecycle.js';

export {
  ConversationLoop,
  CORRECTIVE_PROMPT,
  DEFAULT_MAX_ACTIONS_PER_STEP,
  DEFAULT_MAX_STEPS,
  FINAL_MARKER,
  buildObservationPrompt,
  classifyReply,
  extractFinalAnswer,
  extractThought,
  formatObservation,
  type ConversationLoopConfig,
  type ConversationLoopEvents,
  type ReplyKind,
} from './conversation-loop.js';

export {
  StepReporter,
  StructuredSink,
  TerminalSink,
  MemorySink,
  STEP_JSON_PREFIX,
  parseStructuredLine,
  type ReportEvent,
  type ReportSink,
  type StepEvent,
  type AnswerEvent,
  type ExhaustedEvent,
  type StepReporterEvents,
  type LineWriter,
} from './step-reporter.js';

export { Transcript } from './transcript.js';
export { buildSystemPrompt, type PromptOptions } from './prompt.js';
