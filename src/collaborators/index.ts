export { BundleExporter, type BundleExporterOptions } from './bundle-exporter.js';
export { BundleSchema, CarePlanSchema, PlanDefinitionSchema, type Bundle } from './bundle-schema.js';
export {
  LlmContextProvider,
  LlmGenerator,
  LlmReviewModel,
  LlmScoringModel,
  type LlmCollaboratorOptions,
} from './llm-collaborators.js';
export { LabValuePlausibilityAnalyzer, checkStatement } from './plausibility.js';
export { RenalRuleEvaluator, ckdEpi2021, readLabValue, type RenalToolOutput } from './renal-rules.js';
