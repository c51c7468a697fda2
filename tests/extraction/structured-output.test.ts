/**
 * Structured output extraction tests.
 */

import { describe, it, expect } from 'vitest';
import {
  extractStructuredOutput,
  isSafeDefault,
  PARSE_FAILURE_MESSAGE,
  parseStructuredOutput,
  reviewSafeDefault,
} from '../../src/extraction/structured-output.js';
import {
  balancedBraces,
  extractBalancedObject,
  removeTrailingCommas,
  stripCodeFences,
  trailingCommas,
} from '../../src/extraction/repair-strategies.js';
import { memoryLogger } from '../helpers/stubs.js';

describe('repair strategies', () => {
  it('strips json-tagged fences', () => {
    expect(stripCodeFences('```json\n{"a": 1}\n```')).toBe('{"a": 1}');
  });

  it('strips untagged fences', () => {
    expect(stripCodeFences('```\n{"a": 1}\n```')).toBe('{"a": 1}');
  });

  it('removes trailing commas before closing brackets', () => {
    expect(removeTrailingCommas('{"a": [1, 2,], "b": 3,}')).toBe('{"a": [1, 2], "b": 3}');
  });

  it('ignores braces inside strings when balancing', () => {
    expect(extractBalancedObject('{"a": "}"} trailing }')).toBe('{"a": "}"}');
  });

  it('returns null for an unclosed object', () => {
    expect(extractBalancedObject('{"a": {"b": 1}')).toBeNull();
  });

  it('reports failure as a tagged result instead of throwing', () => {
    const outcome = trailingCommas.attempt('nothing here');
    expect(outcome).toEqual({ kind: 'failed', strategy: 'trailing-commas', reason: 'no object found in text' });
  });

  it('balanced strategy takes the first of several objects', () => {
    const outcome = balancedBraces.attempt('first {"a": 1,} then {"b": 2}');
    expect(outcome).toEqual({ kind: 'parsed', value: { a: 1 }, strategy: 'balanced-braces' });
  });
});

describe('parseStructuredOutput', () => {
  it('parses clean JSON directly', () => {
    expect(parseStructuredOutput('{"a": 1}')).toEqual({ kind: 'parsed', value: { a: 1 }, strategy: 'direct' });
  });

  it('recovers a fenced object surrounded by commentary', () => {
    const text = 'Here you go:\n```json\n{"issues": ["x"], "confidence": 0.7}\n```\nThanks';
    expect(parseStructuredOutput(text)).toEqual({
      kind: 'parsed',
      value: { issues: ['x'], confidence: 0.7 },
      strategy: 'greedy-span',
    });
  });

  it('recovers an object with raw line breaks inside a string', () => {
    const outcome = parseStructuredOutput('{"feedback": "line one\nline two"}');
    expect(outcome).toEqual({
      kind: 'parsed',
      value: { feedback: 'line one line two' },
      strategy: 'flattened-line-breaks',
    });
  });

  it('recovers the first object when two follow each other', () => {
    const outcome = parseStructuredOutput('first {"a": 1} then {"b": 2}');
    expect(outcome).toEqual({ kind: 'parsed', value: { a: 1 }, strategy: 'balanced-braces' });
  });

  it('fails on empty input', () => {
    expect(parseStructuredOutput('   ')).toEqual({ kind: 'failed', strategy: 'none', reason: 'empty input' });
  });

  it('does not accept a top-level array', () => {
    expect(parseStructuredOutput('[1, 2]').kind).toBe('failed');
  });
});

describe('extractStructuredOutput', () => {
  it('removes a trailing comma in commentary-wrapped output', () => {
    const { logger } = memoryLogger();
    const text = 'sure, here: {"issues": ["a"], "recommendations": ["b"], "confidence": 0.8,}';
    expect(extractStructuredOutput(text, { logger })).toEqual({
      issues: ['a'],
      recommendations: ['b'],
      confidence: 0.8,
    });
  });

  it('returns the safe default for text without JSON and warns', () => {
    const { logger, sink } = memoryLogger();
    const result = extractStructuredOutput('I could not review this candidate.', { logger, context: 'review' });

    expect(result).toEqual({
      confidence: 0.5,
      feedback: PARSE_FAILURE_MESSAGE,
      approved: false,
      parse_failed: true,
    });
    expect(isSafeDefault(result)).toBe(true);
    expect(sink.getEntries({ level: 'warn' }).map((e) => e.message)).toEqual([
      'JSON parsing failed for review, using safe default',
    ]);
  });

  it('returns the safe default for empty input', () => {
    const { logger } = memoryLogger();
    expect(extractStructuredOutput('', { logger })).toEqual(reviewSafeDefault());
  });

  it('uses the supplied fallback', () => {
    const { logger } = memoryLogger();
    const result = extractStructuredOutput('plain prose', {
      logger,
      fallback: (raw) => ({ parse_failed: true, raw_text: raw }),
    });
    expect(result).toEqual({ parse_failed: true, raw_text: 'plain prose' });
  });

  it('logs which strategy recovered the object at debug level', () => {
    const { logger, sink } = memoryLogger();
    extractStructuredOutput('note: {"a": 1,}', { logger, context: 'review' });

    const entries = sink.getEntries({ level: 'debug' });
    expect(entries).toHaveLength(1);
    expect(entries[0].message).toBe('Recovered structured output');
    expect(entries[0].data).toEqual({ context: 'review', strategy: 'trailing-commas' });
  });

  it('returns a fresh default object each time', () => {
    const a = reviewSafeDefault();
    const b = reviewSafeDefault();
    expect(a).not.toBe(b);
  });
});
