/**
 * Plausibility analyzer.
 *
 * Checks numeric lab claims in reviewer statements ("creatinine of 2.4",
 * "eGFR: 28") against the normalized record. Each contradicted statement
 * lowers confidence by a fixed step, up to a cap.
 */

import type {
  HallucinationAnalysis,
  PatientRecord,
  PlausibilityAnalyzer,
  ReviewFeedback,
  StatementCheck,
  ToolOutput,
} from '../types.js';
import { readLabValue } from './renal-rules.js';

export const REDUCTION_PER_UNSUPPORTED = 0.1;
export const MAX_REDUCTION = 0.5;

/** Lab mention → canonical record field */
const LAB_FIELDS: Record<string, string> = {
  creatinine: 'creatinine_mg_dl',
  egfr: 'egfr_ckd_epi',
  gfr: 'egfr_ckd_epi',
  potassium: 'potassium_mmol_l',
  bun: 'bun_mg_dl',
  bmi: 'bmi',
};

/**
 * A lab name, an optional linking word, then a number. Numbers that run on
 * into a time or count unit ("48 hours", "2 weeks") are schedules, not values.
 */
const CLAIM_PATTERN =
  /\b(creatinine|egfr|gfr|potassium|bun|bmi)\b\s*(?:of|is|was|=|:)?\s*(-?\d+(?:\.\d+)?)(?!\d|\.\d|\s*(?:h|hrs?|hours?|days?|d|weeks?|wks?|months?|min|minutes?|times|doses?)\b)/gi;

function withinTolerance(claimed: number, actual: number): boolean {
  return Math.abs(claimed - actual) <= Math.max(0.05, Math.abs(actual) * 0.1);
}

/**
 * Value to check a claim against: the record first, then any tool output
 * that carries a computed value under the same short name.
 */
function knownValue(
  lab: string,
  record: PatientRecord,
  toolOutputs: Record<string, ToolOutput>,
): number | null {
  const fromRecord = readLabValue(record[LAB_FIELDS[lab]]);
  if (fromRecord !== null) return fromRecord;

  const short = lab === 'gfr' ? 'egfr' : lab;
  for (const output of Object.values(toolOutputs)) {
    const value = readLabValue(output[short]);
    if (value !== null) return value;
  }
  return null;
}

export function checkStatement(
  statement: string,
  record: PatientRecord,
  toolOutputs: Record<string, ToolOutput>,
): StatementCheck {
  for (const match of statement.matchAll(CLAIM_PATTERN)) {
    const lab = match[1].toLowerCase();
    const claimed = Number(match[2]);
    const actual = knownValue(lab, record, toolOutputs);

    if (actual === null) {
      return { statement, supported: false, reason: `${lab} ${claimed} not present in patient data` };
    }
    if (!withinTolerance(claimed, actual)) {
      return { statement, supported: false, reason: `${lab} stated as ${claimed}, patient data has ${actual}` };
    }
  }
  return { statement, supported: true };
}

export class LabValuePlausibilityAnalyzer implements PlausibilityAnalyzer {
  async analyze(
    draft: ReviewFeedback,
    record: PatientRecord,
    toolOutputs: Record<string, ToolOutput>,
  ): Promise<HallucinationAnalysis> {
    const statements = [...draft.issues, ...draft.recommendations].map((s) =>
      checkStatement(s, record, toolOutputs),
    );
    const unsupported = statements.filter((s) => !s.supported).length;
    const reduction = Math.min(MAX_REDUCTION, unsupported * REDUCTION_PER_UNSUPPORTED);

    return {
      statements,
      recommendation: {
        confidence_reduction: Math.round(reduction * 100) / 100,
        unsupported_count: unsupported,
        action: unsupported > 0 ? 'verify' : 'accept',
      },
    };
  }
}
