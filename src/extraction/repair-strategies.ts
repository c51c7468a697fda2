/**
 * JSON repair strategies
 *
 * Each strategy targets one corruption mode seen in model output and is a
 * pure function from the (fence-stripped) response text to a ParseOutcome.
 * They are tried in DEFAULT_STRATEGIES order; the first `parsed` wins.
 *
 * Corruption modes covered:
 * - prose before/after the object
 * - trailing commas: `{"a": 1,}`
 * - raw line breaks inside string values
 * - several objects, or stray braces, after the one we want
 */

// =============================================================================
// TYPES
// =============================================================================

export type JsonObject = Record<string, unknown>;

export type ParseOutcome =
  | { kind: 'parsed'; value: JsonObject; strategy: string }
  | { kind: 'failed'; strategy: string; reason: string };

export interface RepairStrategy {
  readonly name: string;
  attempt(text: string): ParseOutcome;
}

// =============================================================================
// TEXT HELPERS
// =============================================================================

/**
 * Remove ``` / ```json fence markers at the start or end of any line.
 */
export function stripCodeFences(text: string): string {
  return text.trim().replace(/^```(?:json)?\s*|\s*```$/gm, '');
}

/**
 * Greedy span from the first `{` to the last `}`.
 */
export function findGreedyObjectSpan(text: string): string | null {
  const match = /\{[\s\S]*\}/.exec(text);
  return match ? match[0] : null;
}

/** `{"a": 1,}` → `{"a": 1}` */
export function removeTrailingCommas(text: string): string {
  return text.replace(/,(\s*[}\]])/g, '$1');
}

export function flattenLineBreaks(text: string): string {
  return text.replace(/\n/g, ' ').replace(/\r/g, '');
}

/**
 * Scan from the first `{` and return the span that closes it, tracking
 * brace depth. Braces inside string literals are not counted.
 *
 * Unlike the greedy span this stops at the end of the first object, so
 * `{"a": 1} then {"b": 2}` yields `{"a": 1}`.
 */
export function extractBalancedObject(text: string): string | null {
  const start = text.indexOf('{');
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];

    if (escape) {
      escape = false;
      continue;
    }
    if (char === '\\' && inString) {
      escape = true;
      continue;
    }
    if (char === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;

    if (char === '{') depth++;
    if (char === '}') {
      depth--;
      if (depth === 0) {
        return text.slice(start, i + 1);
      }
    }
  }

  // Unclosed
  return null;
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * JSON.parse that reports instead of throwing, and only accepts objects.
 */
export function tryParseObject(text: string, strategy: string): ParseOutcome {
  try {
    const value: unknown = JSON.parse(text);
    if (isJsonObject(value)) {
      return { kind: 'parsed', value, strategy };
    }
    return {
      kind: 'failed',
      strategy,
      reason: `expected a JSON object, got ${Array.isArray(value) ? 'array' : typeof value}`,
    };
  } catch (err) {
    return { kind: 'failed', strategy, reason: err instanceof Error ? err.message : String(err) };
  }
}

function noObject(strategy: string): ParseOutcome {
  return { kind: 'failed', strategy, reason: 'no object found in text' };
}

// =============================================================================
// STRATEGIES
// =============================================================================

export const directParse: RepairStrategy = {
  name: 'direct',
  attempt: (text) => tryParseObject(text, 'direct'),
};

export const greedySpan: RepairStrategy = {
  name: 'greedy-span',
  attempt(text) {
    const span = findGreedyObjectSpan(text);
    return span === null ? noObject('greedy-span') : tryParseObject(span, 'greedy-span');
  },
};

export const trailingCommas: RepairStrategy = {
  name: 'trailing-commas',
  attempt(text) {
    const span = findGreedyObjectSpan(text);
    return span === null
      ? noObject('trailing-commas')
      : tryParseObject(removeTrailingCommas(span), 'trailing-commas');
  },
};

export const flattenedLineBreaks: RepairStrategy = {
  name: 'flattened-line-breaks',
  attempt(text) {
    const span = findGreedyObjectSpan(text);
    return span === null
      ? noObject('flattened-line-breaks')
      : tryParseObject(removeTrailingCommas(flattenLineBreaks(span)), 'flattened-line-breaks');
  },
};

export const balancedBraces: RepairStrategy = {
  name: 'balanced-braces',
  attempt(text) {
    const span = findGreedyObjectSpan(text);
    const balanced = span === null ? null : extractBalancedObject(span);
    return balanced === null
      ? noObject('balanced-braces')
      : tryParseObject(removeTrailingCommas(balanced), 'balanced-braces');
  },
};

export const DEFAULT_STRATEGIES: readonly RepairStrategy[] = [
  directParse,
  greedySpan,
  trailingCommas,
  flattenedLineBreaks,
  balancedBraces,
];
