export {
  DEFAULT_STRATEGIES,
  stripCodeFences,
  type JsonObject,
  type ParseOutcome,
  type RepairStrategy,
} from './repair-strategies.js';
export {
  extractStructuredOutput,
  isSafeDefault,
  PARSE_FAILURE_MESSAGE,
  parseStructuredOutput,
  reviewSafeDefault,
  type ExtractOptions,
} from './structured-output.js';
