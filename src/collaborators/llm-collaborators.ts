/**
 * LLM-backed collaborators: shared context, generation, review and scoring.
 *
 * Each one owns the provider it calls; nothing reaches for a global client.
 */

import { InitializationError } from '../errors/index.js';
import { extractStructuredOutput } from '../extraction/structured-output.js';
import { createComponentLogger, type StructuredLogger } from '../observability/logger.js';
import { completeJson } from '../providers/provider.js';
import type { LLMProvider } from '../providers/types.js';
import type {
  CandidateOutput,
  ContextProvider,
  Generator,
  PatientRecord,
  RawRecord,
  ReviewFeedback,
  ReviewModel,
  ScoringModel,
  ToolOutput,
} from '../types.js';
import {
  buildContextPrompt,
  buildGenerationPrompt,
  buildScorePrompt,
  CONTEXT_KEY,
} from './prompts.js';

export interface LlmCollaboratorOptions {
  /** Model override; provider default otherwise */
  model?: string;
  logger?: StructuredLogger;
}

// =============================================================================
// CONTEXT
// =============================================================================

export class LlmContextProvider implements ContextProvider {
  private readonly logger: StructuredLogger;

  constructor(
    private readonly provider: LLMProvider,
    private readonly options: LlmCollaboratorOptions = {},
  ) {
    this.logger = options.logger ?? createComponentLogger('ContextProvider');
  }

  /**
   * @throws InitializationError when the call fails or yields no context
   */
  async getContext(record: RawRecord): Promise<string> {
    let text: string;
    try {
      text = await completeJson(this.provider, buildContextPrompt(record), this.options.model);
    } catch (err) {
      throw new InitializationError(
        'Context call failed',
        err instanceof Error ? err : new Error(String(err)),
      );
    }

    const parsed = extractStructuredOutput(text, {
      context: 'context',
      logger: this.logger,
      fallback: () => ({}),
    });
    const value = parsed[CONTEXT_KEY];
    const context =
      typeof value === 'string' ? value.trim() : value === undefined || value === null ? '' : JSON.stringify(value);

    if (context === '') {
      throw new InitializationError('Context step did not produce a context');
    }
    return context;
  }
}

// =============================================================================
// GENERATION
// =============================================================================

export class LlmGenerator implements Generator {
  private readonly logger: StructuredLogger;

  constructor(
    private readonly provider: LLMProvider,
    private readonly options: LlmCollaboratorOptions = {},
  ) {
    this.logger = options.logger ?? createComponentLogger('Generator');
  }

  async generate(
    record: RawRecord,
    context: string,
    feedback: ReviewFeedback | null,
  ): Promise<CandidateOutput> {
    const text = await completeJson(
      this.provider,
      buildGenerationPrompt(record, context, feedback),
      this.options.model,
    );
    return extractStructuredOutput(text, {
      context: 'generation',
      logger: this.logger,
      fallback: (raw) => ({ parse_failed: true, raw_text: raw }),
    });
  }
}

// =============================================================================
// REVIEW + SCORING
// =============================================================================

export class LlmReviewModel implements ReviewModel {
  constructor(
    private readonly provider: LLMProvider,
    private readonly options: LlmCollaboratorOptions = {},
  ) {}

  async reviewCall(prompt: string): Promise<string> {
    return completeJson(this.provider, prompt, this.options.model);
  }
}

export class LlmScoringModel implements ScoringModel {
  readonly scoreKey = 'candidate_confidence';

  constructor(
    private readonly provider: LLMProvider,
    private readonly options: LlmCollaboratorOptions = {},
  ) {}

  async score(candidate: CandidateOutput, record: PatientRecord, toolOutput: ToolOutput): Promise<string> {
    return completeJson(
      this.provider,
      buildScorePrompt(this.scoreKey, candidate, record, toolOutput),
      this.options.model,
    );
  }
}
