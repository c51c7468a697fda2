import { describe, it, expect } from 'vitest';
import {
  LlmContextProvider,
  LlmGenerator,
  LlmReviewModel,
  LlmScoringModel,
} from '../../src/collaborators/llm-collaborators.js';
import { InitializationError, ProviderError } from '../../src/errors/index.js';
import { ScriptedProvider } from '../../src/providers/adapters/scripted.js';
import { JSON_SYSTEM_PROMPT } from '../../src/providers/provider.js';
import type { LLMProvider } from '../../src/providers/types.js';
import { memoryLogger } from '../helpers/stubs.js';

const patient = { age: 72, creatinine: 1.6, indication: 'aortic aneurysm follow-up' };

const failingProvider: LLMProvider = {
  name: 'failing',
  defaultModel: 'none',
  chat: async () => {
    throw new ProviderError('failing API error (503): unavailable', 'failing', 'SERVER_ERROR', 503);
  },
};

describe('LlmContextProvider', () => {
  it('returns the trimmed context', async () => {
    const provider = new ScriptedProvider(['{"enhanced_context": "  72yo, CKD stage 3a  "}']);
    const { logger } = memoryLogger();

    const context = await new LlmContextProvider(provider, { model: 'ctx-model', logger }).getContext(patient);

    expect(context).toBe('72yo, CKD stage 3a');
    expect(provider.calls[0].messages[0]).toEqual({ role: 'system', content: JSON_SYSTEM_PROMPT });
    expect(provider.calls[0].options).toEqual({ model: 'ctx-model' });
    expect(provider.prompts()[0]).toContain('"indication": "aortic aneurysm follow-up"');
  });

  it('serializes a structured context', async () => {
    const provider = new ScriptedProvider(['{"enhanced_context": {"renal": "impaired"}}']);
    const { logger } = memoryLogger();
    expect(await new LlmContextProvider(provider, { logger }).getContext(patient)).toBe('{"renal":"impaired"}');
  });

  it('fails initialization on an empty context', async () => {
    const provider = new ScriptedProvider(['{"enhanced_context": ""}']);
    const { logger } = memoryLogger();
    await expect(new LlmContextProvider(provider, { logger }).getContext(patient)).rejects.toThrow(
      'Context step did not produce a context',
    );
  });

  it('fails initialization when the reply has no JSON', async () => {
    const provider = new ScriptedProvider(['Sorry, I cannot help with that.']);
    const { logger } = memoryLogger();
    await expect(new LlmContextProvider(provider, { logger }).getContext(patient)).rejects.toBeInstanceOf(
      InitializationError,
    );
  });

  it('fails initialization when the call fails', async () => {
    const { logger } = memoryLogger();
    const error = await new LlmContextProvider(failingProvider, { logger }).getContext(patient).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InitializationError);
    expect(error instanceof InitializationError && error.cause).toBeInstanceOf(ProviderError);
  });
});

describe('LlmGenerator', () => {
  it('extracts the candidate from fenced output', async () => {
    const provider = new ScriptedProvider(['```json\n{"protocol_selection": [{"name": "CTA chest"}]}\n```']);
    const { logger } = memoryLogger();

    const candidate = await new LlmGenerator(provider, { logger }).generate(patient, 'ctx', null);

    expect(candidate).toEqual({ protocol_selection: [{ name: 'CTA chest' }] });
    expect(provider.prompts()[0]).not.toContain('Reviewer feedback');
  });

  it('includes previous feedback in the prompt', async () => {
    const provider = new ScriptedProvider(['{"protocol_selection": []}']);
    const { logger } = memoryLogger();

    await new LlmGenerator(provider, { logger }).generate(patient, 'ctx', {
      issues: ['contrast timing unclear'],
      recommendations: ['use arterial phase'],
      confidence: 0.4,
    });

    expect(provider.prompts()[0]).toContain('Reviewer feedback:');
    expect(provider.prompts()[0]).toContain('"contrast timing unclear"');
  });

  it('keeps unparseable output as raw text', async () => {
    const provider = new ScriptedProvider(['CTA chest with contrast']);
    const { logger } = memoryLogger();

    const candidate = await new LlmGenerator(provider, { logger }).generate(patient, 'ctx', null);

    expect(candidate).toEqual({ parse_failed: true, raw_text: 'CTA chest with contrast' });
  });

  it('propagates provider failures', async () => {
    const { logger } = memoryLogger();
    await expect(new LlmGenerator(failingProvider, { logger }).generate(patient, 'ctx', null)).rejects.toBeInstanceOf(
      ProviderError,
    );
  });
});

describe('LlmReviewModel and LlmScoringModel', () => {
  it('returns the raw review text', async () => {
    const provider = new ScriptedProvider(['{"issues": []}']);
    expect(await new LlmReviewModel(provider).reviewCall('review this')).toBe('{"issues": []}');
    expect(provider.prompts()).toEqual(['review this']);
  });

  it('asks for the score under its key', async () => {
    const provider = new ScriptedProvider(['{"candidate_confidence": 0.81}']);
    const scorer = new LlmScoringModel(provider, { model: 'score-model' });

    const text = await scorer.score({ protocol: 'CTA' }, { age: 72 }, { tool: 'renal', checks: [] });

    expect(scorer.scoreKey).toBe('candidate_confidence');
    expect(text).toBe('{"candidate_confidence": 0.81}');
    expect(provider.prompts()[0]).toContain("single key 'candidate_confidence'");
    expect(provider.calls[0].options).toEqual({ model: 'score-model' });
  });
});
