/**
 * Configuration Loader
 *
 * Resolves the runtime configuration from the process environment and the
 * optional project file. Missing or invalid environment keys fail fast with a
 * ConfigurationError; problems in the project file are collected as warnings
 * and the defaults stand.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { ConfigurationError } from '../errors/index.js';
import type { LogLevel } from '../observability/logger.js';
import { DEFAULT_LOOP_POLICY } from '../pipeline/loop-state-machine.js';
import type { OpenAICompatibleConfig } from '../providers/types.js';
import type { LoopPolicy } from '../types.js';
import {
  DEFAULT_OUTPUT_DIR,
  PipelineEnvSchema,
  PROJECT_CONFIG_FILE,
  ProjectConfigSchema,
  type ProjectConfig,
} from './schema.js';

// =============================================================================
// TYPES
// =============================================================================

export interface PipelineConfig {
  /** Provider used for context, generation, review and scoring */
  completion: OpenAICompatibleConfig;
  generationModel: string;
  reviewModel: string;
  scoringModel: string;
  /** Provider for the post-loop export; null when no key is configured */
  export: OpenAICompatibleConfig | null;
  loop: LoopPolicy;
  outputDir: string;
  port: number;
  logLevel: LogLevel;
  logFile?: string;
}

export interface ConfigLoadOptions {
  /** Defaults to process.env */
  env?: NodeJS.ProcessEnv;
  /** Working directory for locating the project file (defaults to process.cwd()) */
  cwd?: string;
}

export interface ConfigLoadResult {
  config: PipelineConfig;
  sources: Array<{ path: string; loaded: boolean }>;
  /** Non-fatal problems with the project file */
  warnings: string[];
}

// =============================================================================
// PROJECT FILE
// =============================================================================

/**
 * Load and validate the project file. Returns null when it is absent or
 * unusable; every problem becomes a warning.
 */
function loadProjectFile(filePath: string, warnings: string[]): ProjectConfig | null {
  if (!existsSync(filePath)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    warnings.push(`${filePath}: failed to parse JSON (${err instanceof Error ? err.message : String(err)})`);
    return null;
  }

  const result = ProjectConfigSchema.safeParse(parsed);
  if (!result.success) {
    for (const issue of result.error.issues) {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      warnings.push(`${filePath}: ${path}: ${issue.message}`);
    }
    return null;
  }

  return result.data;
}

function resolveLoopPolicy(project: ProjectConfig | null, warnings: string[]): LoopPolicy {
  const policy: LoopPolicy = { ...DEFAULT_LOOP_POLICY, ...project?.loop };
  if (policy.minIterations > policy.maxIterations) {
    warnings.push(
      `loop.minIterations (${policy.minIterations}) exceeds loop.maxIterations (${policy.maxIterations}); using defaults`,
    );
    return { ...DEFAULT_LOOP_POLICY };
  }
  return policy;
}

/**
 * Empty strings count as unset, as they do in most .env files.
 */
function withoutEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      out[key] = value.trim();
    }
  }
  return out;
}

// =============================================================================
// LOADER
// =============================================================================

/**
 * Load configuration.
 *
 * Priority for the output directory: OUTPUT_DIR ← project file ← default.
 *
 * @throws ConfigurationError listing every missing or invalid environment key
 */
export function loadConfig(options: ConfigLoadOptions = {}): ConfigLoadResult {
  const { env = process.env, cwd = process.cwd() } = options;
  const warnings: string[] = [];

  const envResult = PipelineEnvSchema.safeParse(withoutEmpty(env));
  if (!envResult.success) {
    const keys = [...new Set(envResult.error.issues.map((i) => String(i.path[0] ?? '(root)')))];
    const missing = keys.filter((k) => env[k] === undefined || env[k]?.trim() === '');
    if (missing.length === keys.length) {
      throw ConfigurationError.missing(keys);
    }
    const details = envResult.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(`Invalid environment: ${details.join(', ')}`, keys);
  }
  const e = envResult.data;

  const projectPath = join(cwd, PROJECT_CONFIG_FILE);
  const project = loadProjectFile(projectPath, warnings);

  const config: PipelineConfig = {
    completion: {
      name: 'groq',
      apiKey: e.GROQ_API_KEY,
      model: e.MODEL,
      baseUrl: e.GROQ_BASE_URL,
    },
    generationModel: e.GENERATION_MODEL ?? e.MODEL,
    reviewModel: e.MODEL,
    scoringModel: e.SCORING_MODEL ?? e.MODEL,
    export: e.GEMINI_API_KEY
      ? {
          name: 'gemini',
          apiKey: e.GEMINI_API_KEY,
          model: e.EXPORT_MODEL,
          baseUrl: e.GEMINI_BASE_URL,
        }
      : null,
    loop: resolveLoopPolicy(project, warnings),
    outputDir: resolve(cwd, e.OUTPUT_DIR ?? project?.outputDir ?? DEFAULT_OUTPUT_DIR),
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    ...(e.LOG_FILE && { logFile: resolve(cwd, e.LOG_FILE) }),
  };

  return {
    config,
    sources: [{ path: projectPath, loaded: project !== null }],
    warnings,
  };
}
