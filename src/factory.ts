/**
 * Builds the default collaborators and pipeline from configuration.
 */

import { BundleExporter } from './collaborators/bundle-exporter.js';
import {
  LlmContextProvider,
  LlmGenerator,
  LlmReviewModel,
  LlmScoringModel,
} from './collaborators/llm-collaborators.js';
import { LabValuePlausibilityAnalyzer } from './collaborators/plausibility.js';
import { RenalRuleEvaluator } from './collaborators/renal-rules.js';
import type { PipelineConfig } from './config/config-manager.js';
import { JsonFileArtifactStore } from './pipeline/artifacts.js';
import { PipelineOrchestrator } from './pipeline/orchestrator.js';
import { ReviewStep } from './pipeline/review-step.js';
import { createProvider } from './providers/provider.js';
import type { LLMProvider } from './providers/types.js';

export interface PipelineComponents {
  orchestrator: PipelineOrchestrator;
  reviewStep: ReviewStep;
}

export interface ComponentOverrides {
  /** Replaces the configured completion provider */
  completionProvider?: LLMProvider;
  /** Replaces the configured export provider; null disables export */
  exportProvider?: LLMProvider | null;
}

export function createReviewStep(config: PipelineConfig, provider: LLMProvider): ReviewStep {
  return new ReviewStep({
    reviewModel: new LlmReviewModel(provider, { model: config.reviewModel }),
    scoringModel: new LlmScoringModel(provider, { model: config.scoringModel }),
    ruleEvaluator: new RenalRuleEvaluator(),
    plausibility: new LabValuePlausibilityAnalyzer(),
  });
}

export function createPipeline(config: PipelineConfig, overrides: ComponentOverrides = {}): PipelineComponents {
  const completion =
    overrides.completionProvider ?? createProvider({ type: 'openai-compatible', config: config.completion });

  const exportProvider =
    overrides.exportProvider !== undefined
      ? overrides.exportProvider
      : config.export
        ? createProvider({ type: 'openai-compatible', config: config.export })
        : null;

  const reviewStep = createReviewStep(config, completion);

  const orchestrator = new PipelineOrchestrator({
    contextProvider: new LlmContextProvider(completion, { model: config.reviewModel }),
    generator: new LlmGenerator(completion, { model: config.generationModel }),
    reviewer: reviewStep,
    store: new JsonFileArtifactStore(config.outputDir),
    ...(exportProvider && { exporter: new BundleExporter(exportProvider) }),
    policy: config.loop,
  });

  return { orchestrator, reviewStep };
}
