/**
 * Clinical Review Loop - library entry.
 *
 * The CLI lives in main.ts; this module exposes the pipeline pieces for
 * embedding and for custom collaborators.
 */

export * from './collaborators/index.js';
export * from './config/index.js';
export * from './errors/index.js';
export * from './extraction/index.js';
export * from './pipeline/index.js';
export { createApp, startServer, type PipelineRunner, type ServeDeps } from './commands/serve.js';
export { parsePatientText, runReviewCommand } from './commands/review.js';
export { createPipeline, createReviewStep, type ComponentOverrides, type PipelineComponents } from './factory.js';
export {
  configureLogger,
  ConsoleSink,
  createComponentLogger,
  FileSink,
  MemorySink,
  StructuredLogger,
  type LogEntry,
  type LogLevel,
  type LogSink,
} from './observability/logger.js';
export { OpenAICompatibleProvider } from './providers/adapters/openai-compatible.js';
export { ScriptedProvider } from './providers/adapters/scripted.js';
export { completeJson, createProvider } from './providers/provider.js';
export type {
  ChatOptions,
  ChatResponse,
  LLMProvider,
  Message,
  OpenAICompatibleConfig,
  ProviderConfig,
} from './providers/types.js';
export type {
  ArtifactStore,
  CandidateOutput,
  CandidateReviewer,
  CheckPriority,
  CheckStatus,
  ContextProvider,
  DocumentExporter,
  FieldValue,
  Generator,
  HallucinationAnalysis,
  LoopPolicy,
  LoopState,
  PatientRecord,
  PipelineResult,
  PlausibilityAnalyzer,
  RawRecord,
  ReviewFeedback,
  ReviewModel,
  ReviewResult,
  RuleEvaluator,
  ScoringModel,
  StatementCheck,
  ToolCheck,
  ToolOutput,
} from './types.js';
