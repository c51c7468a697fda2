/**
 * Bundle exporter: converts the final candidate into a validated FHIR
 * collection Bundle through a completion call and stores it beside the run's
 * other artifacts. Every failure surfaces as ConversionError.
 */

import { ConversionError, PersistenceError, ValidationError } from '../errors/index.js';
import { parseStructuredOutput } from '../extraction/structured-output.js';
import { createComponentLogger, type StructuredLogger } from '../observability/logger.js';
import { ARTIFACT_NAMES } from '../pipeline/artifacts.js';
import { completeJson } from '../providers/provider.js';
import type { LLMProvider } from '../providers/types.js';
import type { ArtifactStore, CandidateOutput, DocumentExporter } from '../types.js';
import { BundleSchema, type Bundle } from './bundle-schema.js';
import { buildExportPrompt } from './prompts.js';

export interface BundleExporterOptions {
  model?: string;
  logger?: StructuredLogger;
}

export class BundleExporter implements DocumentExporter {
  readonly name = 'fhir-bundle';
  private readonly logger: StructuredLogger;

  constructor(
    private readonly provider: LLMProvider,
    private readonly options: BundleExporterOptions = {},
  ) {
    this.logger = options.logger ?? createComponentLogger('BundleExporter');
  }

  async export(finalOutput: CandidateOutput, store: ArtifactStore): Promise<Bundle> {
    let text: string;
    try {
      text = await completeJson(this.provider, buildExportPrompt(finalOutput), this.options.model);
    } catch (err) {
      throw new ConversionError(
        'Export call failed',
        { provider: this.provider.name },
        err instanceof Error ? err : new Error(String(err)),
      );
    }

    const outcome = parseStructuredOutput(text);
    if (outcome.kind === 'failed') {
      throw new ConversionError('Could not parse export output as JSON', {
        reason: outcome.reason,
        preview: text.slice(0, 1000),
      });
    }

    const result = BundleSchema.safeParse(outcome.value);
    if (!result.success) {
      const validation = ValidationError.fromZodError(result.error);
      throw new ConversionError(
        'Bundle validation failed',
        { fields: validation.fields, preview: JSON.stringify(outcome.value).slice(0, 1200) },
        validation,
      );
    }

    try {
      const filePath = await store.save(ARTIFACT_NAMES.bundle, result.data);
      this.logger.info('Bundle saved', { path: filePath, entries: result.data.entry.length });
    } catch (err) {
      if (err instanceof PersistenceError) {
        throw new ConversionError('Could not store bundle', { path: err.path }, err);
      }
      throw err;
    }

    return result.data;
  }
}
