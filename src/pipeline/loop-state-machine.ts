/**
 * Loop State Machine
 *
 * Phase tracking for one pipeline run, with typed transitions, transition
 * history and event emission. The stopping predicate lives here too and is
 * a pure function of (iteration, confidence).
 *
 * Phases:
 * - init: obtain the shared context (once)
 * - generate: produce a candidate
 * - review: critique the candidate
 * - done: terminal
 *
 * Valid transitions:
 *   init     → generate
 *   generate → review
 *   review   → generate | done
 */

import type { LoopPolicy } from '../types.js';

// =============================================================================
// TYPES
// =============================================================================

export type LoopPhase = 'init' | 'generate' | 'review' | 'done';

export interface PhaseTransition {
  from: LoopPhase;
  to: LoopPhase;
  reason: string;
  /** Iteration in progress when the transition happened (0 during init) */
  iteration: number;
  timestamp: number;
}

export type LoopEvent =
  | { type: 'phase.changed'; transition: PhaseTransition }
  | { type: 'phase.rejected'; from: LoopPhase; to: LoopPhase; reason: string };

export type LoopEventListener = (event: LoopEvent) => void;

// =============================================================================
// STOPPING RULE
// =============================================================================

export const DEFAULT_LOOP_POLICY: Readonly<LoopPolicy> = {
  maxIterations: 6,
  minIterations: 2,
  confidenceThreshold: 0.75,
};

/**
 * Whether another generate/review cycle should run after `iteration` finished
 * with `confidence`.
 *
 * Continue while under the cap, unless the threshold was met at or after the
 * minimum iteration. The loop stops the first time that happens; there is no
 * best-of-N selection.
 */
export function shouldContinue(
  iteration: number,
  confidence: number,
  policy: Readonly<LoopPolicy> = DEFAULT_LOOP_POLICY,
): boolean {
  if (iteration >= policy.maxIterations) return false;
  return !(iteration >= policy.minIterations && confidence >= policy.confidenceThreshold);
}

// =============================================================================
// VALID TRANSITIONS
// =============================================================================

const VALID_TRANSITIONS: Record<LoopPhase, Set<LoopPhase>> = {
  init: new Set(['generate']),
  generate: new Set(['review']),
  review: new Set(['generate', 'done']),
  done: new Set(),
};

// =============================================================================
// LOOP STATE MACHINE
// =============================================================================

export class LoopStateMachine {
  private currentPhase: LoopPhase = 'init';
  private iteration = 0;
  private listeners: LoopEventListener[] = [];
  private transitions: PhaseTransition[] = [];

  getPhase(): LoopPhase {
    return this.currentPhase;
  }

  /** Iteration in progress, 1-based; 0 before the first generate */
  getIteration(): number {
    return this.iteration;
  }

  getTransitions(): readonly PhaseTransition[] {
    return this.transitions;
  }

  isDone(): boolean {
    return this.currentPhase === 'done';
  }

  /**
   * Attempt a phase transition. Entering `generate` starts a new iteration.
   * Returns false (and emits `phase.rejected`) for a transition the table
   * does not allow.
   */
  transition(to: LoopPhase, reason: string): boolean {
    if (!VALID_TRANSITIONS[this.currentPhase].has(to)) {
      this.emit({ type: 'phase.rejected', from: this.currentPhase, to, reason });
      return false;
    }

    if (to === 'generate') {
      this.iteration++;
    }

    const record: PhaseTransition = {
      from: this.currentPhase,
      to,
      reason,
      iteration: this.iteration,
      timestamp: Date.now(),
    };
    this.transitions.push(record);
    this.currentPhase = to;
    this.emit({ type: 'phase.changed', transition: record });
    return true;
  }

  /**
   * Subscribe to state machine events.
   * Returns an unsubscribe function.
   */
  subscribe(listener: LoopEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }

  private emit(event: LoopEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch {
        // Listener errors must not affect the run
      }
    }
  }
}
