#!/usr/bin/env node
/**
 * Clinical Review Loop
 *
 * Generate → review → regenerate until the reviewer is confident enough or
 * the iteration cap is hit.
 *
 * Commands:
 * - serve (default): HTTP service exposing POST /run_pipeline
 * - review: one review step over files on disk
 *
 * Run: npm start
 */

// Load environment
import { config as loadEnv } from 'dotenv';
loadEnv();

import { realpathSync } from 'node:fs';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import chalk from 'chalk';

import { runReviewCommand, REVIEW_USAGE } from './commands/review.js';
import { createApp, startServer } from './commands/serve.js';
import { loadConfig, type PipelineConfig } from './config/index.js';
import { formatError } from './errors/index.js';
import { createPipeline, createReviewStep } from './factory.js';
import {
  configureLogger,
  ConsoleSink,
  createComponentLogger,
  FileSink,
  type LogSink,
} from './observability/logger.js';
import { createProvider } from './providers/provider.js';

export const USAGE = `${chalk.bold('review-loop')} - confidence-gated generate/review pipeline

${chalk.bold('Commands:')}
  serve                                             Start the HTTP service (default)
  review <patient-file> <candidate-file> <output>   Review one candidate and write the result

${chalk.bold('Environment:')}
  GROQ_API_KEY      required
  MODEL             completion model (default openai/gpt-oss-120b)
  GEMINI_API_KEY    enables the bundle export after each run
  OUTPUT_DIR        artifact directory (default outputs)
  PORT              HTTP port (default 8000)
  LOG_LEVEL         trace|debug|info|warn|error|silent (default info)

${REVIEW_USAGE}`;

export interface MainIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

const defaultIO: MainIO = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

/**
 * Load configuration and point the global logger at it. Warnings from the
 * project file are logged once the logger is configured.
 */
function setup(): PipelineConfig {
  const { config, warnings } = loadConfig();

  const sinks: LogSink[] = [new ConsoleSink()];
  if (config.logFile) {
    sinks.push(new FileSink(config.logFile));
  }
  configureLogger({ level: config.logLevel, sinks });

  const log = createComponentLogger('Config');
  for (const warning of warnings) {
    log.warn(warning);
  }
  return config;
}

function serveCommand(io: MainIO): number {
  let config: PipelineConfig;
  try {
    config = setup();
  } catch (err) {
    io.stderr(chalk.red(`Error: ${formatError(err)}`));
    return 1;
  }

  const { orchestrator } = createPipeline(config);
  const app = createApp({ orchestrator, outputDir: config.outputDir });
  const server = startServer(app, config.port);

  const shutdown = () => {
    server.close();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
  return 0;
}

/**
 * Dispatch a command line. Returns the exit code; `serve` returns 0 once the
 * server is listening and keeps the process alive.
 */
export async function main(argv: readonly string[] = process.argv.slice(2), io: MainIO = defaultIO): Promise<number> {
  const [command = 'serve', ...rest] = argv;

  switch (command) {
    case '--help':
    case '-h':
    case 'help':
      io.stdout(USAGE);
      return 0;

    case 'serve':
      return serveCommand(io);

    case 'review':
      return runReviewCommand(rest, {
        createReviewer: () => {
          const config = setup();
          return createReviewStep(config, createProvider({ type: 'openai-compatible', config: config.completion }));
        },
        stdout: io.stdout,
        stderr: io.stderr,
      });

    default:
      io.stderr(chalk.red(`Unknown command: ${command}`));
      io.stderr(USAGE);
      return 1;
  }
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return realpathSync(resolve(script)) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main()
    .then((code) => {
      if (code !== 0) process.exitCode = code;
    })
    .catch((err: unknown) => {
      console.error(chalk.red(`Fatal: ${formatError(err)}`));
      process.exitCode = 1;
    });
}
