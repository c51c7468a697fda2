/**
 * `review` command: run a single review step over files on disk.
 *
 *   review-loop review <patient-file> <candidate-file> <output-file>
 *
 * Exit codes: 0 on success, 1 on a usage error or any runtime failure.
 */

import fs from 'node:fs/promises';
import chalk from 'chalk';
import { formatError, PersistenceError, ValidationError } from '../errors/index.js';
import { serializeArtifact } from '../pipeline/artifacts.js';
import type { CandidateOutput, CandidateReviewer, RawRecord } from '../types.js';

export const REVIEW_USAGE = 'Usage: review-loop review <patient-file> <candidate-file> <output-file>';

export interface ReviewArgs {
  patientPath: string;
  candidatePath: string;
  outputPath: string;
}

export interface ReviewCommandDeps {
  /** Called only once the arguments are valid */
  createReviewer: () => CandidateReviewer;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
}

export function parseReviewArgs(argv: readonly string[]): ReviewArgs | null {
  if (argv.length !== 3) return null;
  const [patientPath, candidatePath, outputPath] = argv;
  return { patientPath, candidatePath, outputPath };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Interpret patient input text.
 *
 * - a JSON object is used as-is
 * - two or more lines of comma-separated text whose first cell is not a
 *   number: header line + value line, values kept as strings
 * - anything else: `{ raw_text }`
 */
export function parsePatientText(content: string): RawRecord {
  const text = content.trim();

  try {
    const parsed: unknown = JSON.parse(text);
    if (isPlainObject(parsed)) return parsed;
  } catch {
    // not JSON; try CSV below
  }

  const cells = text.split(',').map((p) => p.trim());
  const firstIsNumber = cells[0] !== '' && Number.isFinite(Number(cells[0]));
  const lines = text.split(/\r?\n/);

  if (cells.length > 1 && !firstIsNumber && lines.length > 1) {
    const header = lines[0].split(',').map((h) => h.trim());
    const values = lines[1].split(',').map((v) => v.trim());
    const record: RawRecord = {};
    for (let i = 0; i < Math.min(header.length, values.length); i++) {
      record[header[i]] = values[i];
    }
    return record;
  }

  return { raw_text: text };
}

export async function loadPatientData(filePath: string): Promise<RawRecord> {
  return parsePatientText(await readText(filePath));
}

async function readText(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    throw new PersistenceError(
      `Cannot read ${filePath}`,
      filePath,
      'read',
      err instanceof Error ? err : new Error(String(err)),
    );
  }
}

async function loadCandidate(filePath: string): Promise<CandidateOutput> {
  const text = await readText(filePath);
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new ValidationError(`${filePath} is not valid JSON`, ['candidate']);
  }
  if (!isPlainObject(parsed)) {
    throw new ValidationError(`${filePath} must contain a JSON object`, ['candidate']);
  }
  return parsed;
}

export async function runReviewCommand(argv: readonly string[], deps: ReviewCommandDeps): Promise<number> {
  const out = deps.stdout ?? ((line: string) => console.log(line));
  const err = deps.stderr ?? ((line: string) => console.error(line));

  const args = parseReviewArgs(argv);
  if (!args) {
    err(REVIEW_USAGE);
    return 1;
  }

  try {
    const reviewer = deps.createReviewer();
    const patient = await loadPatientData(args.patientPath);
    const candidate = await loadCandidate(args.candidatePath);

    const result = await reviewer.review(patient, candidate);

    try {
      await fs.writeFile(args.outputPath, serializeArtifact(result), 'utf-8');
    } catch (writeErr) {
      throw new PersistenceError(
        `Cannot write ${args.outputPath}`,
        args.outputPath,
        'write',
        writeErr instanceof Error ? writeErr : new Error(String(writeErr)),
      );
    }

    out(chalk.green(`Review written to ${args.outputPath}`));
    return 0;
  } catch (error) {
    err(chalk.red(`Error: ${formatError(error)}`));
    return 1;
  }
}
