import { describe, it, expect } from 'vitest';
import { LabValuePlausibilityAnalyzer } from '../../src/collaborators/plausibility.js';
import { RenalRuleEvaluator } from '../../src/collaborators/renal-rules.js';
import { filterToolChecks, ReviewStep, type ReviewStepDeps } from '../../src/pipeline/review-step.js';
import type { PlausibilityAnalyzer, ToolOutput } from '../../src/types.js';
import {
  FixedPlausibility,
  memoryLogger,
  StubReviewModel,
  StubRuleEvaluator,
  StubScoringModel,
} from '../helpers/stubs.js';

const toolOutput: ToolOutput = {
  tool: 'renal',
  checks: [
    { name: 'creatinine', status: 'ok', priority: 'required', value: 1.1 },
    { name: 'bmi', status: 'missing', priority: 'optional' },
    { name: 'egfr', status: 'missing', priority: 'required' },
  ],
};

const filteredChecks = [
  { name: 'creatinine', status: 'ok', priority: 'required', value: 1.1 },
  { name: 'egfr', status: 'missing', priority: 'required' },
];

const REVIEW_REPLY = 'sure, here: {"issues": ["a"], "recommendations": ["b"], "confidence": 0.8,}';
const NOW = new Date('2026-03-01T12:00:00Z');

function makeStep(overrides: Partial<ReviewStepDeps> = {}) {
  const { logger, sink } = memoryLogger();
  const reviewModel = new StubReviewModel(REVIEW_REPLY);
  const scoringModel = new StubScoringModel('{"candidate_confidence": 0.7}');
  const ruleEvaluator = new StubRuleEvaluator(toolOutput);
  const plausibility = new FixedPlausibility(0.1);
  const step = new ReviewStep({
    reviewModel,
    scoringModel,
    ruleEvaluator,
    plausibility,
    logger,
    now: () => NOW,
    ...overrides,
  });
  return { step, sink, reviewModel, scoringModel, ruleEvaluator, plausibility };
}

describe('filterToolChecks', () => {
  it('drops only checks that are both optional and missing', () => {
    expect(filterToolChecks(toolOutput).checks).toEqual(filteredChecks);
  });

  it('leaves the input untouched', () => {
    filterToolChecks(toolOutput);
    expect(toolOutput.checks).toHaveLength(3);
  });
});

describe('ReviewStep', () => {
  it('assembles the review result', async () => {
    const { step } = makeStep();

    const result = await step.review({ Creatinine: 1.1 }, { protocol: 'CTA chest' });

    expect(result.issues).toEqual(['a']);
    expect(result.recommendations).toEqual(['b']);
    expect(result.confidence).toBeCloseTo(0.7, 10);
    expect(result.candidate_confidence).toBe(0.7);
    expect(result.timestamp).toBe('2026-03-01T12:00:00.000Z');
    expect(result.llm_raw).toBe(REVIEW_REPLY);
    expect(result.tool_outputs).toEqual({ renal: { tool: 'renal', checks: filteredChecks } });
    expect(result.hallucination_analysis.recommendation.confidence_reduction).toBe(0.1);
    expect(result.feedback).toEqual({
      issues: ['a'],
      recommendations: ['b'],
      confidence: result.confidence,
    });
  });

  it('hands the feedback payload its own arrays', async () => {
    const { step } = makeStep();
    const result = await step.review({}, {});
    expect(result.feedback.issues).not.toBe(result.issues);
  });

  it('normalizes the record before rule evaluation and scoring', async () => {
    const { step, ruleEvaluator, scoringModel, reviewModel } = makeStep();

    await step.review({ ' Serum_Creatinine ': 1.1, K: 4 }, { protocol: 'CTA chest' });

    expect(ruleEvaluator.records).toEqual([{ creatinine_mg_dl: 1.1, k: 4 }]);
    expect(scoringModel.toolOutputs[0].checks).toEqual(filteredChecks);
    expect(reviewModel.prompts[0]).toContain('"creatinine_mg_dl": 1.1');
    expect(reviewModel.prompts[0]).toContain('" Serum_Creatinine ": 1.1');
  });

  it('gives the plausibility analyzer the coerced draft', async () => {
    const { step, plausibility } = makeStep({
      reviewModel: new StubReviewModel('{"issues": "one issue", "confidence": "0.9"}'),
    });

    await step.review({}, {});

    expect(plausibility.drafts).toEqual([{ issues: ['one issue'], recommendations: [], confidence: 0.9 }]);
  });

  it('logs coerced fields at debug level', async () => {
    const { step, sink } = makeStep({ reviewModel: new StubReviewModel('{"issues": "x", "recommendations": [], "confidence": 0.4}') });

    await step.review({}, {});

    const entry = sink.getEntries().find((e) => e.message === 'Coerced review fields');
    expect(entry?.level).toBe('debug');
    expect(entry?.data).toEqual({ fields: ['issues'] });
  });

  it('falls back to neutral feedback when the review text has no JSON', async () => {
    const { step } = makeStep({
      reviewModel: new StubReviewModel('The protocol looks fine to me.'),
      plausibility: new FixedPlausibility(0),
    });

    const result = await step.review({}, {});

    expect(result.issues).toEqual([]);
    expect(result.recommendations).toEqual([]);
    expect(result.confidence).toBe(0.5);
    expect(result.llm_raw).toBe('The protocol looks fine to me.');
  });

  it('ignores a malformed penalty', async () => {
    const { step } = makeStep({ plausibility: new FixedPlausibility('lots') });
    const result = await step.review({}, {});
    expect(result.confidence).toBe(0.8);
  });

  it('keeps confidence in [0, 1] when the penalty exceeds it', async () => {
    const { step } = makeStep({ plausibility: new FixedPlausibility(5) });
    const result = await step.review({}, {});
    expect(result.confidence).toBe(0);
  });

  it('reports a null score when the scoring call fails', async () => {
    const { step, sink } = makeStep({ scoringModel: new StubScoringModel(new Error('scoring timeout')) });

    const result = await step.review({}, {});

    expect(result.candidate_confidence).toBeNull();
    expect(result.confidence).toBeCloseTo(0.7, 10);
    expect(sink.getEntries({ level: 'warn' }).map((e) => e.message)).toEqual([
      'Scoring call failed, score unavailable',
    ]);
  });

  it('reports a null score when the scoring text is unusable', async () => {
    const { step, sink } = makeStep({ scoringModel: new StubScoringModel('about seven out of ten') });

    const result = await step.review({}, {});

    expect(result.candidate_confidence).toBeNull();
    expect(sink.messages()).toContain('Score unavailable');
  });

  it('reports a null score without a scoring model', async () => {
    const { step } = makeStep({ scoringModel: undefined });
    expect((await step.review({}, {})).candidate_confidence).toBeNull();
  });

  it('propagates a failing review call', async () => {
    const { step } = makeStep({ reviewModel: new StubReviewModel(new Error('review unavailable')) });
    await expect(step.review({}, {})).rejects.toThrow('review unavailable');
  });

  it('propagates a failing rule evaluator', async () => {
    const { step } = makeStep({ ruleEvaluator: new StubRuleEvaluator(new Error('rules broke')) });
    await expect(step.review({}, {})).rejects.toThrow('rules broke');
  });

  it('propagates a failing plausibility analyzer', async () => {
    const failing: PlausibilityAnalyzer = {
      analyze: async () => {
        throw new Error('analysis broke');
      },
    };
    const { step } = makeStep({ plausibility: failing });
    await expect(step.review({}, {})).rejects.toThrow('analysis broke');
  });

  it('penalizes contradicted lab values with the default collaborators', async () => {
    const { logger } = memoryLogger();
    const step = new ReviewStep({
      reviewModel: new StubReviewModel(
        JSON.stringify({
          issues: ['Creatinine of 2.4 contraindicates contrast', 'No prior imaging documented'],
          recommendations: ['Hydrate before the scan'],
          confidence: 0.9,
        }),
      ),
      ruleEvaluator: new RenalRuleEvaluator(),
      plausibility: new LabValuePlausibilityAnalyzer(),
      logger,
    });

    const result = await step.review({ Cr: 1.0, eGFR: 72, Age: 55 }, { protocol: 'CTA chest' });

    expect(result.hallucination_analysis.recommendation).toEqual({
      confidence_reduction: 0.1,
      unsupported_count: 1,
      action: 'verify',
    });
    expect(result.confidence).toBeCloseTo(0.8, 10);
    expect(Object.keys(result.tool_outputs)).toEqual(['renal']);
    expect(result.tool_outputs.renal.checks.map((c) => c.name)).toEqual(['creatinine', 'egfr']);
  });
});
