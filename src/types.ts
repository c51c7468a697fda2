/**
 * Core types for the review loop.
 *
 * JSON-facing records keep snake_case keys: they are written to disk and
 * returned over HTTP unchanged.
 */

// =============================================================================
// RECORDS
// =============================================================================

export type FieldValue = number | string | boolean | null;

/** Raw input record, arbitrary key spelling */
export type RawRecord = Record<string, unknown>;

/** Record with canonical keys (see FIELD_ALIASES) */
export type PatientRecord = Record<string, unknown>;

/** Generation output. Opaque to the loop. */
export type CandidateOutput = Record<string, unknown>;

export type CheckStatus = 'ok' | 'missing' | 'flagged';
export type CheckPriority = 'required' | 'optional';

export interface ToolCheck {
  name: string;
  status: CheckStatus;
  priority: CheckPriority;
  value?: FieldValue;
  message?: string;
}

export interface ToolOutput {
  tool: string;
  checks: ToolCheck[];
  [key: string]: unknown;
}

export interface ReviewFeedback {
  issues: string[];
  recommendations: string[];
  /** Always within [0, 1] */
  confidence: number;
}

export interface StatementCheck {
  statement: string;
  supported: boolean;
  reason?: string;
}

export interface HallucinationAnalysis {
  statements: StatementCheck[];
  recommendation: {
    /** Non-negative amount subtracted from the reviewer confidence */
    confidence_reduction: number;
    unsupported_count: number;
    action: 'accept' | 'verify';
  };
}

/**
 * What one review step produces: the feedback itself plus the auxiliary
 * fields kept for audit.
 */
export interface ReviewResult extends ReviewFeedback {
  /** Model-derived score for the candidate; null when unavailable */
  candidate_confidence: number | null;
  timestamp: string;
  tool_outputs: Record<string, ToolOutput>;
  llm_raw: string;
  hallucination_analysis: HallucinationAnalysis;
  /** Payload handed to the next generation step */
  feedback: ReviewFeedback;
}

export interface LoopState {
  iteration: number;
  last_feedback: ReviewResult | null;
  last_candidate: CandidateOutput | null;
}

export interface PipelineResult {
  final_output: CandidateOutput;
  loops_run: number;
  /** Confidence of the last review */
  confidence: number;
  /** Model-derived score of the final candidate; null when unavailable */
  candidate_confidence: number | null;
}

// =============================================================================
// COLLABORATORS
// =============================================================================

/** One-time call producing the context every iteration depends on */
export interface ContextProvider {
  getContext(record: RawRecord): Promise<string>;
}

export interface Generator {
  generate(
    record: RawRecord,
    context: string,
    feedback: ReviewFeedback | null,
  ): Promise<CandidateOutput>;
}

export interface ReviewModel {
  reviewCall(prompt: string): Promise<string>;
}

export interface ScoringModel {
  /** Key the score is expected under, e.g. `candidate_confidence` */
  readonly scoreKey: string;
  score(candidate: CandidateOutput, record: PatientRecord, toolOutput: ToolOutput): Promise<string>;
}

export interface RuleEvaluator {
  /** Name the output is filed under in `tool_outputs` */
  readonly toolName: string;
  evaluate(record: PatientRecord): Promise<ToolOutput>;
}

export interface PlausibilityAnalyzer {
  analyze(
    draft: ReviewFeedback,
    record: PatientRecord,
    toolOutputs: Record<string, ToolOutput>,
  ): Promise<HallucinationAnalysis>;
}

/** Named JSON documents for one run */
export interface ArtifactStore {
  /** Directory (or other location) the artifacts live in */
  readonly location: string;
  /** Write `data` under `name`; returns where it was written */
  save(name: string, data: unknown): Promise<string>;
  /** null when no artifact exists under `name` */
  load(name: string): Promise<unknown | null>;
  list(): Promise<string[]>;
}

/** Post-loop conversion of the final candidate into a downstream document */
export interface DocumentExporter {
  readonly name: string;
  export(finalOutput: CandidateOutput, store: ArtifactStore): Promise<unknown>;
}

/** Anything that can review a candidate (the review step, or a stub in tests) */
export interface CandidateReviewer {
  review(record: RawRecord, candidate: CandidateOutput): Promise<ReviewResult>;
}

// =============================================================================
// LOOP POLICY
// =============================================================================

/** Stopping rule parameters for the orchestration loop */
export interface LoopPolicy {
  /** Hard cap on iterations */
  maxIterations: number;
  /** First iteration at which the threshold may stop the loop */
  minIterations: number;
  confidenceThreshold: number;
}
