export {
  loadConfig,
  type ConfigLoadOptions,
  type ConfigLoadResult,
  type PipelineConfig,
} from './config-manager.js';
export {
  DEFAULT_EXPORT_MODEL,
  DEFAULT_GEMINI_BASE_URL,
  DEFAULT_GROQ_BASE_URL,
  DEFAULT_MODEL,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_PORT,
  PipelineEnvSchema,
  PROJECT_CONFIG_FILE,
  ProjectConfigSchema,
  type PipelineEnv,
  type ProjectConfig,
} from './schema.js';
