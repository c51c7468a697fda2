/**
 * Confidence Evaluator
 *
 * Two signals feed the confidence of a review:
 * - a model-derived score for the candidate (may be unavailable → null)
 * - a plausibility penalty subtracted from the reviewer-stated confidence
 *
 * The coercion schema below is the boundary where loosely-typed review output
 * becomes a ReviewFeedback; nothing downstream re-checks types.
 */

import { z } from 'zod';
import { parseStructuredOutput } from '../extraction/structured-output.js';
import type { ReviewFeedback } from '../types.js';

export const DEFAULT_CONFIDENCE = 0.5;

export function clampUnit(value: number): number {
  return Math.max(0, Math.min(1, value));
}

/**
 * Numbers and numeric strings to a finite number; everything else to null.
 */
export function toFiniteNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

// =============================================================================
// SHAPE COERCION
// =============================================================================

function statementToString(item: unknown): string {
  if (typeof item === 'string') return item;
  if (typeof item === 'object' && item !== null) return JSON.stringify(item);
  return String(item);
}

/**
 * A string-array schema that accepts a bare scalar as a one-element array
 * and treats null/undefined as empty.
 */
function coerceStatements() {
  return z.preprocess((val) => {
    if (val === undefined || val === null) return [];
    if (Array.isArray(val)) return val.map(statementToString);
    return [statementToString(val)];
  }, z.array(z.string()));
}

/**
 * A confidence schema: numeric strings accepted, anything unparseable
 * becomes DEFAULT_CONFIDENCE, result clamped to [0, 1].
 */
function coerceConfidence() {
  return z.preprocess((val) => {
    const n = toFiniteNumber(val);
    return n === null ? DEFAULT_CONFIDENCE : clampUnit(n);
  }, z.number().min(0).max(1));
}

export const FeedbackShapeSchema = z.object({
  issues: coerceStatements(),
  recommendations: coerceStatements(),
  confidence: coerceConfidence(),
});

export interface CoercionResult {
  feedback: ReviewFeedback;
  /** Fields whose value had to be rewritten to fit the shape */
  coerced: string[];
}

/**
 * Force an extracted object into the ReviewFeedback shape.
 */
export function coerceFeedbackShape(raw: Record<string, unknown>): CoercionResult {
  const feedback = FeedbackShapeSchema.parse({
    issues: raw.issues,
    recommendations: raw.recommendations,
    confidence: raw.confidence,
  });

  const coerced: string[] = [];
  if (!Array.isArray(raw.issues) || !raw.issues.every((i) => typeof i === 'string')) {
    coerced.push('issues');
  }
  if (
    !Array.isArray(raw.recommendations) ||
    !raw.recommendations.every((r) => typeof r === 'string')
  ) {
    coerced.push('recommendations');
  }
  if (typeof raw.confidence !== 'number' || raw.confidence !== feedback.confidence) {
    coerced.push('confidence');
  }

  return { feedback, coerced };
}

// =============================================================================
// PENALTY
// =============================================================================

/**
 * Subtract a plausibility penalty from a base confidence.
 *
 * A malformed base counts as DEFAULT_CONFIDENCE; a malformed or negative
 * penalty counts as 0. The result is always in [0, 1] and never above the
 * (clamped) base.
 */
export function applyPenalty(base: unknown, reduction: unknown): number {
  const baseValue = toFiniteNumber(base);
  const start = baseValue === null ? DEFAULT_CONFIDENCE : clampUnit(baseValue);
  const penalty = toFiniteNumber(reduction);
  return clampUnit(start - (penalty !== null && penalty > 0 ? penalty : 0));
}

// =============================================================================
// MODEL-DERIVED SCORE
// =============================================================================

/**
 * Read `{ "<scoreKey>": number }` from scoring output.
 *
 * Finite values are clamped into [0, 1]. Unparseable text, a missing key or
 * a non-numeric value give null, which callers must keep distinct from 0.
 */
export function parseModelScore(text: string, scoreKey: string): number | null {
  const outcome = parseStructuredOutput(text);
  if (outcome.kind !== 'parsed' || !(scoreKey in outcome.value)) {
    return null;
  }
  const value = toFiniteNumber(outcome.value[scoreKey]);
  return value === null ? null : clampUnit(value);
}
