/**
 * Review Step
 *
 * Wraps one external review call into a typed ReviewResult:
 *
 *   normalize → rule evaluation → drop optional+missing checks
 *   → model score (best effort) → review call → extract + coerce
 *   → plausibility analysis → penalty → assemble
 *
 * Malformed model text never makes this throw. Errors from the review call,
 * the rule evaluator or the plausibility analyzer propagate.
 */

import { formatError } from '../errors/index.js';
import { extractStructuredOutput } from '../extraction/structured-output.js';
import { buildReviewPrompt } from '../collaborators/prompts.js';
import { createComponentLogger, type StructuredLogger } from '../observability/logger.js';
import type {
  CandidateOutput,
  CandidateReviewer,
  PatientRecord,
  PlausibilityAnalyzer,
  RawRecord,
  ReviewModel,
  ReviewResult,
  RuleEvaluator,
  ScoringModel,
  ToolOutput,
} from '../types.js';
import { applyPenalty, coerceFeedbackShape, parseModelScore } from './confidence.js';
import { normalizeFields } from './field-normalizer.js';

export interface ReviewStepDeps {
  reviewModel: ReviewModel;
  ruleEvaluator: RuleEvaluator;
  plausibility: PlausibilityAnalyzer;
  /** Omit to run without a model-derived score (always null) */
  scoringModel?: ScoringModel;
  /** Builds the review prompt; defaults to the imaging reviewer prompt */
  buildPrompt?: typeof buildReviewPrompt;
  logger?: StructuredLogger;
  /** Injected for tests */
  now?: () => Date;
}

/**
 * Drop checks that are both optional and missing; they are noise to the
 * reviewer.
 */
export function filterToolChecks(output: ToolOutput): ToolOutput {
  return {
    ...output,
    checks: output.checks.filter((c) => !(c.status === 'missing' && c.priority === 'optional')),
  };
}

export class ReviewStep implements CandidateReviewer {
  private readonly logger: StructuredLogger;
  private readonly buildPrompt: typeof buildReviewPrompt;
  private readonly now: () => Date;

  constructor(private readonly deps: ReviewStepDeps) {
    this.logger = deps.logger ?? createComponentLogger('ReviewStep');
    this.buildPrompt = deps.buildPrompt ?? buildReviewPrompt;
    this.now = deps.now ?? (() => new Date());
  }

  async review(raw: RawRecord, candidate: CandidateOutput): Promise<ReviewResult> {
    const record = normalizeFields(raw);

    const toolOutput = filterToolChecks(await this.deps.ruleEvaluator.evaluate(record));
    const toolOutputs: Record<string, ToolOutput> = { [this.deps.ruleEvaluator.toolName]: toolOutput };

    const candidateConfidence = await this.scoreCandidate(candidate, record, toolOutput);

    const llmRaw = await this.deps.reviewModel.reviewCall(this.buildPrompt(raw, record, toolOutputs, candidate));
    const extracted = extractStructuredOutput(llmRaw, { context: 'review', logger: this.logger });
    const { feedback: draft, coerced } = coerceFeedbackShape(extracted);
    if (coerced.length > 0) {
      this.logger.debug('Coerced review fields', { fields: coerced });
    }

    const analysis = await this.deps.plausibility.analyze(draft, record, toolOutputs);
    const confidence = applyPenalty(draft.confidence, analysis.recommendation.confidence_reduction);

    const feedback = {
      issues: draft.issues,
      recommendations: draft.recommendations,
      confidence,
    };

    return {
      ...feedback,
      candidate_confidence: candidateConfidence,
      timestamp: this.now().toISOString(),
      tool_outputs: toolOutputs,
      llm_raw: llmRaw,
      hallucination_analysis: analysis,
      feedback: { ...feedback, issues: [...feedback.issues], recommendations: [...feedback.recommendations] },
    };
  }

  /**
   * Model-derived score, or null when scoring is unavailable for any reason.
   */
  private async scoreCandidate(
    candidate: CandidateOutput,
    record: PatientRecord,
    toolOutput: ToolOutput,
  ): Promise<number | null> {
    const scorer = this.deps.scoringModel;
    if (!scorer) return null;

    let text: string;
    try {
      text = await scorer.score(candidate, record, toolOutput);
    } catch (err) {
      this.logger.warn('Scoring call failed, score unavailable', { error: formatError(err) });
      return null;
    }

    const score = parseModelScore(text, scorer.scoreKey);
    if (score === null) {
      this.logger.warn('Score unavailable', { key: scorer.scoreKey, preview: text.slice(0, 200) });
    }
    return score;
  }
}
