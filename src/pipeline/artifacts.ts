/**
 * Artifact persistence.
 *
 * Each run gets its own directory; each artifact is one JSON file in it,
 * pretty-printed with two spaces, UTF-8, non-ASCII written as-is. There is no
 * rollback: a failed write raises PersistenceError and the run aborts.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { PersistenceError } from '../errors/index.js';
import type { ArtifactStore } from '../types.js';

export const ARTIFACT_NAMES = {
  candidate: (iteration: number) => `candidate_loop${iteration}.json`,
  feedback: (iteration: number) => `feedback_loop${iteration}.json`,
  final: 'final.json',
  bundle: 'fhir_bundle.json',
} as const;

export function serializeArtifact(data: unknown): string {
  return JSON.stringify(data, null, 2) + '\n';
}

function asError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * JSON file store rooted at one directory, created on first write.
 */
export class JsonFileArtifactStore implements ArtifactStore {
  constructor(private readonly baseDir: string) {}

  get location(): string {
    return this.baseDir;
  }

  private filePath(name: string): string {
    if (name !== path.basename(name) || name === '' || name === '.' || name === '..') {
      throw new PersistenceError(`Invalid artifact name: ${name}`, path.join(this.baseDir, name), 'write');
    }
    return path.join(this.baseDir, name);
  }

  async save(name: string, data: unknown): Promise<string> {
    const filePath = this.filePath(name);
    try {
      await fs.mkdir(this.baseDir, { recursive: true });
      await fs.writeFile(filePath, serializeArtifact(data), 'utf-8');
    } catch (err) {
      throw new PersistenceError(`Failed to write ${name}`, filePath, 'write', asError(err));
    }
    return filePath;
  }

  async load(name: string): Promise<unknown | null> {
    const filePath = this.filePath(name);
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return null;
      throw new PersistenceError(`Failed to read ${name}`, filePath, 'read', asError(err));
    }

    try {
      const parsed: unknown = JSON.parse(content);
      return parsed;
    } catch (err) {
      throw new PersistenceError(`${name} is not valid JSON`, filePath, 'read', asError(err));
    }
  }

  async list(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.baseDir);
      return entries.filter((e) => e.endsWith('.json')).sort();
    } catch (err) {
      if (isNotFound(err)) return [];
      throw new PersistenceError('Failed to list artifacts', this.baseDir, 'list', asError(err));
    }
  }
}
