export { ARTIFACT_NAMES, JsonFileArtifactStore, serializeArtifact } from './artifacts.js';
export {
  applyPenalty,
  clampUnit,
  coerceFeedbackShape,
  DEFAULT_CONFIDENCE,
  FeedbackShapeSchema,
  parseModelScore,
  toFiniteNumber,
} from './confidence.js';
export { canonicalFieldName, FIELD_ALIASES, normalizeFields } from './field-normalizer.js';
export {
  DEFAULT_LOOP_POLICY,
  LoopStateMachine,
  shouldContinue,
  type LoopEvent,
  type LoopEventListener,
  type LoopPhase,
  type PhaseTransition,
} from './loop-state-machine.js';
export { PipelineOrchestrator, type OrchestratorDeps, type RunOptions } from './orchestrator.js';
export { filterToolChecks, ReviewStep, type ReviewStepDeps } from './review-step.js';
