/**
 * HTTP service
 *
 *   POST /run_pipeline  { "sample_patient": { ... } }  → PipelineResult
 *   GET  /health                                       → { status, timestamp }
 *
 * Each run writes its artifacts under `<outputDir>/<runId>/`; the run id is
 * returned in the `X-Run-Id` header.
 */

import { randomUUID } from 'node:crypto';
import { join } from 'node:path';
import { serve } from '@hono/node-server';
import { Hono } from 'hono';
import { logger as requestLogger } from 'hono/logger';
import { z } from 'zod';
import { formatError, formatErrorForLog, isPipelineError, ValidationError } from '../errors/index.js';
import { createComponentLogger, type StructuredLogger } from '../observability/logger.js';
import { JsonFileArtifactStore } from '../pipeline/artifacts.js';
import type { RunOptions } from '../pipeline/orchestrator.js';
import type { ArtifactStore, PipelineResult, RawRecord } from '../types.js';

export const RunPipelineRequestSchema = z.object({
  sample_patient: z.record(z.unknown()),
});

export interface PipelineRunner {
  run(record: RawRecord, options?: RunOptions): Promise<PipelineResult>;
}

export interface ServeDeps {
  orchestrator: PipelineRunner;
  outputDir: string;
  createStore?: (dir: string) => ArtifactStore;
  logger?: StructuredLogger;
}

export function createApp(deps: ServeDeps): Hono {
  const log = deps.logger ?? createComponentLogger('Server');
  const createStore = deps.createStore ?? ((dir: string) => new JsonFileArtifactStore(dir));

  const app = new Hono();

  app.use('*', requestLogger((message) => log.info(message)));

  app.get('/health', (c) => {
    return c.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.post('/run_pipeline', async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: 'Request body must be valid JSON' }, 400);
    }

    const parsed = RunPipelineRequestSchema.safeParse(body);
    if (!parsed.success) {
      return c.json({ error: ValidationError.fromZodError(parsed.error).message }, 400);
    }

    const runId = randomUUID();
    try {
      const result = await deps.orchestrator.run(parsed.data.sample_patient, {
        runId,
        store: createStore(join(deps.outputDir, runId)),
      });
      c.header('X-Run-Id', runId);
      return c.json(result);
    } catch (err) {
      log.error('Pipeline failed', {
        runId,
        error: formatErrorForLog(err),
        category: isPipelineError(err) ? err.category : 'INTERNAL',
      });
      c.header('X-Run-Id', runId);
      return c.json({ error: formatError(err) }, 500);
    }
  });

  return app;
}

export type Server = ReturnType<typeof serve>;

export function startServer(app: Hono, port: number, log: StructuredLogger = createComponentLogger('Server')): Server {
  const server = serve({ fetch: app.fetch, port, hostname: '0.0.0.0' }, (info) => {
    log.info(`Listening on http://localhost:${info.port}`);
  });
  return server;
}
