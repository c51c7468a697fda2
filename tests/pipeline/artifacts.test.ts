import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { PersistenceError } from '../../src/errors/index.js';
import { ARTIFACT_NAMES, JsonFileArtifactStore, serializeArtifact } from '../../src/pipeline/artifacts.js';
import { makeTempDir } from '../helpers/stubs.js';

describe('serializeArtifact', () => {
  it('pretty-prints with two spaces and keeps non-ASCII text', () => {
    expect(serializeArtifact({ note: 'contraste iodé', n: [1] })).toBe(
      '{\n  "note": "contraste iodé",\n  "n": [\n    1\n  ]\n}\n',
    );
  });
});

describe('JsonFileArtifactStore', () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ dir, cleanup } = await makeTempDir('review-loop-store-'));
  });

  afterEach(async () => {
    await cleanup();
  });

  it('creates its directory on first write', async () => {
    const store = new JsonFileArtifactStore(join(dir, 'run-1'));

    const written = await store.save(ARTIFACT_NAMES.candidate(1), { protocol: 'MRI brain' });

    expect(written).toBe(join(dir, 'run-1', 'candidate_loop1.json'));
    expect(await readFile(written, 'utf-8')).toBe('{\n  "protocol": "MRI brain"\n}\n');
    expect(await store.load('candidate_loop1.json')).toEqual({ protocol: 'MRI brain' });
  });

  it('lists stored artifacts in name order', async () => {
    const store = new JsonFileArtifactStore(dir);
    await store.save(ARTIFACT_NAMES.final, {});
    await store.save(ARTIFACT_NAMES.feedback(1), {});
    await writeFile(join(dir, 'notes.txt'), 'ignored', 'utf-8');

    expect(await store.list()).toEqual(['feedback_loop1.json', 'final.json']);
  });

  it('returns null and an empty list before anything is written', async () => {
    const store = new JsonFileArtifactStore(join(dir, 'missing'));
    expect(await store.load('final.json')).toBeNull();
    expect(await store.list()).toEqual([]);
  });

  it('rejects names that leave the run directory', async () => {
    const store = new JsonFileArtifactStore(dir);
    await expect(store.save('../escape.json', {})).rejects.toThrow('Invalid artifact name: ../escape.json');
  });

  it('raises PersistenceError for a corrupt artifact', async () => {
    await writeFile(join(dir, 'final.json'), '{ not json', 'utf-8');
    await expect(new JsonFileArtifactStore(dir).load('final.json')).rejects.toBeInstanceOf(PersistenceError);
  });
});
