/**
 * Zod schemas for configuration.
 *
 * Two sources: the process environment (keys, endpoints, models) and an
 * optional `review-loop.config.json` in the working directory (loop policy,
 * output directory).
 */

import { z } from 'zod';
import { LOG_LEVELS } from '../observability/logger.js';

export const DEFAULT_GROQ_BASE_URL = 'https://api.groq.com/openai/v1';
export const DEFAULT_GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta/openai';
export const DEFAULT_MODEL = 'openai/gpt-oss-120b';
export const DEFAULT_EXPORT_MODEL = 'gemini-2.5-flash';
export const DEFAULT_OUTPUT_DIR = 'outputs';
export const DEFAULT_PORT = 8000;

export const PROJECT_CONFIG_FILE = 'review-loop.config.json';

// =============================================================================
// ENVIRONMENT
// =============================================================================

export const PipelineEnvSchema = z.object({
  GROQ_API_KEY: z.string().min(1),
  GROQ_BASE_URL: z.string().url().default(DEFAULT_GROQ_BASE_URL),
  MODEL: z.string().min(1).default(DEFAULT_MODEL),
  GENERATION_MODEL: z.string().min(1).optional(),
  SCORING_MODEL: z.string().min(1).optional(),
  GEMINI_API_KEY: z.string().min(1).optional(),
  GEMINI_BASE_URL: z.string().url().default(DEFAULT_GEMINI_BASE_URL),
  EXPORT_MODEL: z.string().min(1).default(DEFAULT_EXPORT_MODEL),
  OUTPUT_DIR: z.string().min(1).optional(),
  PORT: z.coerce.number().int().min(1).max(65535).default(DEFAULT_PORT),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  LOG_FILE: z.string().min(1).optional(),
});

export type PipelineEnv = z.infer<typeof PipelineEnvSchema>;

// =============================================================================
// PROJECT FILE
// =============================================================================

const LoopPolicySchema = z
  .object({
    maxIterations: z.number().int().positive().optional(),
    minIterations: z.number().int().positive().optional(),
    confidenceThreshold: z.number().min(0).max(1).optional(),
  })
  .strict();

export const ProjectConfigSchema = z
  .object({
    loop: LoopPolicySchema.optional(),
    outputDir: z.string().min(1).optional(),
  })
  .strict();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
