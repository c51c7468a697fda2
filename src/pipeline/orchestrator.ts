/**
 * Pipeline Orchestrator
 *
 * Drives one run: obtain the shared context once, then alternate generate and
 * review until the stopping rule says stop, persisting every candidate and
 * review. The final candidate is written as `final.json` and handed to the
 * optional exporter.
 *
 * Generation and review failures are not caught here. Initialization and
 * persistence failures abort the run. Export failures are logged only.
 */

import { randomUUID } from 'node:crypto';
import { ErrorCategory, formatError, InitializationError, PipelineError, wrapError } from '../errors/index.js';
import { createComponentLogger, type StructuredLogger } from '../observability/logger.js';
import type {
  ArtifactStore,
  CandidateReviewer,
  ContextProvider,
  DocumentExporter,
  Generator,
  LoopPolicy,
  LoopState,
  PipelineResult,
  RawRecord,
} from '../types.js';
import { ARTIFACT_NAMES } from './artifacts.js';
import {
  DEFAULT_LOOP_POLICY,
  LoopStateMachine,
  shouldContinue,
  type LoopEventListener,
  type LoopPhase,
} from './loop-state-machine.js';

export interface OrchestratorDeps {
  contextProvider: ContextProvider;
  generator: Generator;
  reviewer: CandidateReviewer;
  /** Used when `run()` is given no store */
  store: ArtifactStore;
  exporter?: DocumentExporter;
  policy?: Partial<LoopPolicy>;
  logger?: StructuredLogger;
}

export interface RunOptions {
  /** Artifact store for this run; defaults to the orchestrator's store */
  store?: ArtifactStore;
  /** Trace id for log entries; random when omitted */
  runId?: string;
  /** Observes phase transitions of this run */
  onPhase?: LoopEventListener;
}

export class PipelineOrchestrator {
  private readonly policy: LoopPolicy;
  private readonly logger: StructuredLogger;

  constructor(private readonly deps: OrchestratorDeps) {
    this.policy = { ...DEFAULT_LOOP_POLICY, ...deps.policy };
    this.logger = deps.logger ?? createComponentLogger('Orchestrator');
  }

  async run(record: RawRecord, options: RunOptions = {}): Promise<PipelineResult> {
    const store = options.store ?? this.deps.store;
    const log = this.logger.withTrace(options.runId ?? randomUUID());
    const machine = new LoopStateMachine();
    const unsubscribe = options.onPhase ? machine.subscribe(options.onPhase) : undefined;

    try {
      log.info('Pipeline started', { outputDir: store.location });

      const context = await this.initialize(record);

      const state: LoopState = { iteration: 0, last_feedback: null, last_candidate: null };
      let confidence = 0;

      for (;;) {
        this.enter(machine, 'generate', state.iteration === 0 ? 'context ready' : 'below threshold');
        state.iteration = machine.getIteration();
        log.info(`Loop ${state.iteration}`, { iteration: state.iteration });

        const candidate = await this.deps.generator.generate(
          record,
          context,
          state.last_feedback ? state.last_feedback.feedback : null,
        );
        state.last_candidate = candidate;
        await store.save(ARTIFACT_NAMES.candidate(state.iteration), candidate);

        this.enter(machine, 'review', 'candidate generated');
        const review = await this.deps.reviewer.review(record, candidate);
        state.last_feedback = review;
        await store.save(ARTIFACT_NAMES.feedback(state.iteration), review);

        confidence = review.confidence;
        log.info('Review complete', {
          iteration: state.iteration,
          confidence,
          candidateConfidence: review.candidate_confidence,
        });

        if (!shouldContinue(state.iteration, confidence, this.policy)) {
          if (state.iteration >= this.policy.minIterations && confidence >= this.policy.confidenceThreshold) {
            log.info(`Confidence ${confidence} reached threshold, stopping`, { iteration: state.iteration });
          } else {
            log.info('Iteration cap reached', { iteration: state.iteration });
          }
          break;
        }
      }

      this.enter(machine, 'done', 'stopping rule');

      const finalOutput = state.last_candidate;
      if (finalOutput === null) {
        throw new PipelineError('Loop finished without a candidate', ErrorCategory.INTERNAL, false);
      }
      await store.save(ARTIFACT_NAMES.final, finalOutput);
      await this.runExporter(finalOutput, store, log);

      const result: PipelineResult = {
        final_output: finalOutput,
        loops_run: state.iteration,
        confidence,
        candidate_confidence: state.last_feedback ? state.last_feedback.candidate_confidence : null,
      };
      log.info('Pipeline complete', { loopsRun: result.loops_run, confidence });
      return result;
    } finally {
      unsubscribe?.();
    }
  }

  /**
   * One-time context call. Any failure or an empty context is fatal.
   */
  private async initialize(record: RawRecord): Promise<string> {
    let context: string;
    try {
      context = await this.deps.contextProvider.getContext(record);
    } catch (err) {
      if (err instanceof InitializationError) throw err;
      throw new InitializationError(
        `Context step failed: ${formatError(err)}`,
        wrapError(err, { stage: 'init' }),
      );
    }

    if (typeof context !== 'string' || context.trim() === '') {
      throw new InitializationError('Context step did not produce a context');
    }
    return context;
  }

  private async runExporter(
    finalOutput: PipelineResult['final_output'],
    store: ArtifactStore,
    log: StructuredLogger,
  ): Promise<void> {
    const exporter = this.deps.exporter;
    if (!exporter) return;

    try {
      await exporter.export(finalOutput, store);
      log.info('Export complete', { exporter: exporter.name });
    } catch (err) {
      const error = wrapError(err, { stage: 'export' });
      log.error('Export failed', {
        exporter: exporter.name,
        error: error.message,
        category: error.category,
        recoverable: error.recoverable,
      });
    }
  }

  private enter(machine: LoopStateMachine, phase: LoopPhase, reason: string): void {
    if (!machine.transition(phase, reason)) {
      throw new PipelineError(
        `Invalid loop transition ${machine.getPhase()} → ${phase}`,
        ErrorCategory.INTERNAL,
        false,
        { from: machine.getPhase(), to: phase },
      );
    }
  }
}
