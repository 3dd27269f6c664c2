/**
 * @fileoverview Loop Lifecycle Controller - Manages conversation loop phase transitions.
 *
 * The lifecycle controller enforces the loop state machine, rejecting
 * invalid transitions and providing hooks for observability. It is the
 * authoritative source for "what phase is the run in, and at which step?"
 *
 * State Machine:
 * ```
 *            ┌──────────────────────────────────────────┐
 *            ▼                                          │
 *   AWAITING_MODEL ──► ACTIONS_FOUND ───────────────────┤
 *        │   │    └──► NEITHER ─────────────────────────┘
 *        │   └───────► FINAL_FOUND ──► TERMINATED
 *        │
 *        └──► TERMINATED (step budget spent)
 *
 *   Any non-terminal phase can be forced to FAILED.
 * ```
 *
 * @module sql-audit-agent/agent/lifecycle
 * @version 0.1.0
 */

import { EventEmitter } from 'eventemitter3';
import { v4 as uuidv4 } from 'uuid';
import type { UniqueId, Timestamp } from '../types/core.types.js';
import { LoopPhase, createUniqueId, createTimestamp } from '../types/core.types.js';

/**
 * Events emitted during lifecycle transitions.
 */
export interface LifecycleEvents {
  'phase:enter': (phase: LoopPhase, metadata: PhaseMetadata) => void;
  'phase:exit': (phase: LoopPhase, metadata: PhaseMetadata) => void;
  'transition': (from: LoopPhase, to: LoopPhase, reason: string) => void;
  'error': (error: LifecycleError) => void;
}

/**
 * Metadata associated with a phase.
 */
export interface PhaseMetadata {
  readonly enteredAt: Timestamp;
  readonly stepNumber: number;
  readonly reason: string;
  readonly data: Readonly<Record<string, unknown>>;
}

/**
 * Error during lifecycle operations.
 */
export interface LifecycleError {
  readonly code: 'TERMINAL_STATE' | 'INVALID_TRANSITION';
  readonly message: string;
  readonly phase: LoopPhase;
  readonly attemptedTransition: LoopPhase;
}

/**
 * Snapshot of current lifecycle state.
 */
export interface LifecycleState {
  readonly runId: UniqueId;
  readonly currentPhase: LoopPhase;
  readonly previousPhase: LoopPhase | null;
  readonly stepNumber: number;
  readonly phaseHistory: ReadonlyArray<PhaseHistoryEntry>;
  readonly startedAt: Timestamp;
  readonly lastTransitionAt: Timestamp;
  readonly isTerminal: boolean;
}

/**
 * Entry in the phase history.
 */
export interface PhaseHistoryEntry {
  readonly phase: LoopPhase;
  readonly stepNumber: number;
  readonly enteredAt: Timestamp;
  readonly exitedAt: Timestamp | null;
  readonly reason: string;
}

/**
 * Valid transitions from each phase.
 * This is the authoritative definition of the state machine.
 */
const VALID_TRANSITIONS: ReadonlyMap<LoopPhase, ReadonlyArray<LoopPhase>> = new Map([
  [
    LoopPhase.AWAITING_MODEL,
    [LoopPhase.ACTIONS_FOUND, LoopPhase.FINAL_FOUND, LoopPhase.NEITHER, LoopPhase.TERMINATED],
  ],
  [LoopPhase.ACTIONS_FOUND, [LoopPhase.AWAITING_MODEL, LoopPhase.TERMINATED]],
  [LoopPhase.NEITHER, [LoopPhase.AWAITING_MODEL, LoopPhase.TERMINATED]],
  [LoopPhase.FINAL_FOUND, [LoopPhase.TERMINATED]],
  [LoopPhase.TERMINATED, []],
  [LoopPhase.FAILED, []],
]);

const TERMINAL_PHASES: ReadonlySet<LoopPhase> = new Set([LoopPhase.TERMINATED, LoopPhase.FAILED]);

/**
 * Manages the phase of one conversation loop run.
 *
 * A run starts in AWAITING_MODEL at step 1. Every return to AWAITING_MODEL
 * opens the next step.
 *
 * @example
 * ```typescript
 * const lifecycle = new LifecycleController();
 * lifecycle.on('transition', (from, to, reason) => {
 *   logger.debug('Phase change', { from, to, reason });
 * });
 *
 * lifecycle.transition(LoopPhase.ACTIONS_FOUND, '2 action lines');
 * lifecycle.transition(LoopPhase.AWAITING_MODEL, 'Observations sent');
 * ```
 */
export class LifecycleController extends EventEmitter<LifecycleEvents> {
  private readonly runId: UniqueId;
  private currentPhase: LoopPhase;
  private previousPhase: LoopPhase | null;
  private stepNumber: number;
  private readonly phaseHistory: PhaseHistoryEntry[];
  private readonly startedAt: Timestamp;
  private lastTransitionAt: Timestamp;
  private currentPhaseEntry: PhaseHistoryEntry | null;

  constructor(runId?: UniqueId) {
    super();
    this.runId = runId ?? createUniqueId(uuidv4());
    this.currentPhase = LoopPhase.AWAITING_MODEL;
    this.previousPhase = null;
    this.stepNumber = 1;
    this.phaseHistory = [];
    this.startedAt = createTimestamp();
    this.lastTransitionAt = this.startedAt;
    this.currentPhaseEntry = null;

    this.enterPhase(LoopPhase.AWAITING_MODEL, 'Run started');
  }

  getState(): LifecycleState {
    return {
      runId: this.runId,
      currentPhase: this.currentPhase,
      previousPhase: this.previousPhase,
      stepNumber: this.stepNumber,
      phaseHistory: [...this.phaseHistory],
      startedAt: this.startedAt,
      lastTransitionAt: this.lastTransitionAt,
      isTerminal: this.isTerminal(),
    };
  }

  getCurrentPhase(): LoopPhase {
    return this.currentPhase;
  }

  /**
   * Gets the 1-based number of the current step.
   */
  getStepNumber(): number {
    return this.stepNumber;
  }

  isTerminal(): boolean {
    return TERMINAL_PHASES.has(this.currentPhase);
  }

  /**
   * Checks if a transition to the target phase is valid.
   */
  canTransition(targetPhase: LoopPhase): boolean {
    const validTargets = VALID_TRANSITIONS.get(this.currentPhase);
    return validTargets !== undefined && validTargets.includes(targetPhase);
  }

  /**
   * Transitions to a new phase.
   *
   * @throws Error if the transition is invalid
   */
  transition(targetPhase: LoopPhase, reason: string, data: Record<string, unknown> = {}): void {
    if (this.isTerminal()) {
      this.reject('TERMINAL_STATE', `Cannot transition from terminal state '${this.currentPhase}'`, targetPhase);
    }

    if (!this.canTransition(targetPhase)) {
      this.reject('INVALID_TRANSITION', `Invalid transition: '${this.currentPhase}' → '${targetPhase}'`, targetPhase);
    }

    this.exitPhase();

    this.previousPhase = this.currentPhase;
    this.currentPhase = targetPhase;
    this.lastTransitionAt = createTimestamp();

    if (targetPhase === LoopPhase.AWAITING_MODEL) {
      this.stepNumber++;
    }

    this.emit('transition', this.previousPhase, this.currentPhase, reason);
    this.enterPhase(targetPhase, reason, data);
  }

  /**
   * Forces a transition to FAILED from any non-terminal phase.
   */
  fail(reason: string): void {
    if (this.isTerminal()) {
      return;
    }

    this.exitPhase();

    this.previousPhase = this.currentPhase;
    this.currentPhase = LoopPhase.FAILED;
    this.lastTransitionAt = createTimestamp();

    this.emit('transition', this.previousPhase, LoopPhase.FAILED, reason);
    this.enterPhase(LoopPhase.FAILED, reason, { forced: true });
  }

  /**
   * Ends the run. Valid after a final answer, after a non-terminal step,
   * or before any model call when no step budget remains.
   */
  terminate(reason: string): void {
    this.transition(LoopPhase.TERMINATED, reason);
  }

  // ============ Private Methods ============

  private reject(code: LifecycleError['code'], message: string, attempted: LoopPhase): never {
    const error: LifecycleError = {
      code,
      message,
      phase: this.currentPhase,
      attemptedTransition: attempted,
    };
    this.emit('error', error);
    throw new Error(message);
  }

  private enterPhase(phase: LoopPhase, reason: string, data: Record<string, unknown> = {}): void {
    const now = createTimestamp();

    this.currentPhaseEntry = {
      phase,
      stepNumber: this.stepNumber,
      enteredAt: now,
      exitedAt: null,
      reason,
    };

    this.emit('phase:enter', phase, { enteredAt: now, stepNumber: this.stepNumber, reason, data });
  }

  private exitPhase(): void {
    if (this.currentPhaseEntry) {
      this.phaseHistory.push({ ...this.currentPhaseEntry, exitedAt: createTimestamp() });

      this.emit('phase:exit', this.currentPhase, {
        enteredAt: this.currentPhaseEntry.enteredAt,
        stepNumber: this.currentPhaseEntry.stepNumber,
        reason: this.currentPhaseEntry.reason,
        data: {},
      });
      this.currentPhaseEntry = null;
    }
  }
}

/**
 * Creates a new lifecycle controller for a run.
 */
export function createLifecycle(runId?: UniqueId): LifecycleController {
  return new LifecycleController(runId);
}
