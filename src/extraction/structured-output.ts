/**
 * Structured Output Extraction
 *
 * Recovers one JSON object from free-form model output. Parsing goes through
 * the repair strategies in order; if none succeeds the caller gets a safe
 * default object instead of null or an exception, so downstream code never
 * branches on absence.
 */

import { createComponentLogger, type StructuredLogger } from '../observability/logger.js';
import {
  DEFAULT_STRATEGIES,
  stripCodeFences,
  type JsonObject,
  type ParseOutcome,
  type RepairStrategy,
} from './repair-strategies.js';

// =============================================================================
// SAFE DEFAULTS
// =============================================================================

export const PARSE_FAILURE_MESSAGE = 'JSON parsing error in model output';

export interface ReviewSafeDefault extends JsonObject {
  confidence: number;
  feedback: string;
  approved: false;
  parse_failed: true;
}

/**
 * Fallback for review-shaped output: neutral confidence, not approved.
 * A new object each call.
 */
export function reviewSafeDefault(): ReviewSafeDefault {
  return {
    confidence: 0.5,
    feedback: PARSE_FAILURE_MESSAGE,
    approved: false,
    parse_failed: true,
  };
}

export function isSafeDefault(value: JsonObject): boolean {
  return value.parse_failed === true;
}

// =============================================================================
// PARSING
// =============================================================================

/**
 * Run the repair strategies over `text` and return the first success, or the
 * last failure.
 */
export function parseStructuredOutput(
  text: string,
  strategies: readonly RepairStrategy[] = DEFAULT_STRATEGIES,
): ParseOutcome {
  if (typeof text !== 'string' || text.trim() === '') {
    return { kind: 'failed', strategy: 'none', reason: 'empty input' };
  }

  const stripped = stripCodeFences(text);
  let last: ParseOutcome = { kind: 'failed', strategy: 'none', reason: 'no strategies' };

  for (const strategy of strategies) {
    last = strategy.attempt(stripped);
    if (last.kind === 'parsed') {
      return last;
    }
  }

  return last;
}

export interface ExtractOptions {
  /** Builds the object returned when nothing parses (default: reviewSafeDefault) */
  fallback?: (text: string) => JsonObject;
  /** Label for the diagnostic, e.g. "review" */
  context?: string;
  logger?: StructuredLogger;
  strategies?: readonly RepairStrategy[];
}

/**
 * Extract a JSON object from model output. Never throws and never returns
 * null: unrecoverable input yields `options.fallback(text)`.
 */
export function extractStructuredOutput(text: string, options: ExtractOptions = {}): JsonObject {
  const outcome = parseStructuredOutput(text, options.strategies);

  if (outcome.kind === 'parsed') {
    if (outcome.strategy !== 'direct') {
      (options.logger ?? createComponentLogger('Extraction')).debug('Recovered structured output', {
        context: options.context,
        strategy: outcome.strategy,
      });
    }
    return outcome.value;
  }

  (options.logger ?? createComponentLogger('Extraction')).warn(
    `JSON parsing failed${options.context ? ` for ${options.context}` : ''}, using safe default`,
    {
      reason: outcome.reason.slice(0, 200),
      preview: typeof text === 'string' ? text.slice(0, 200) : undefined,
    },
  );

  return options.fallback ? options.fallback(text) : reviewSafeDefault();
}
