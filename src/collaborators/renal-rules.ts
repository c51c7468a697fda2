/**
 * Renal rule evaluator.
 *
 * Deterministic checks on kidney-function fields ahead of contrast imaging.
 * Reads canonical field names (see FIELD_ALIASES); values may be numbers or
 * strings, as they arrive from CSV input, with or without a trailing unit.
 */

import type { CheckPriority, PatientRecord, RuleEvaluator, ToolCheck, ToolOutput } from '../types.js';

export type ContrastRisk = 'low' | 'moderate' | 'high' | 'unknown';

export interface RenalToolOutput extends ToolOutput {
  egfr: number | null;
  egfr_source: 'reported' | 'computed' | 'unavailable';
  contrast_risk: ContrastRisk;
}

type Sex = 'female' | 'male';

const LEADING_NUMBER = /^\s*(-?\d+(?:\.\d+)?)/;

/**
 * Numeric lab value from a record field. Strings are read up to the first
 * non-numeric character, so "1.4 mg/dL" gives 1.4.
 */
export function readLabValue(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string') return null;
  const match = LEADING_NUMBER.exec(value);
  return match ? Number(match[1]) : null;
}

function readSex(record: PatientRecord): Sex | null {
  const raw = record.sex ?? record.gender;
  if (typeof raw !== 'string') return null;
  const first = raw.trim().toLowerCase().charAt(0);
  if (first === 'f') return 'female';
  if (first === 'm') return 'male';
  return null;
}

/**
 * CKD-EPI 2021 (race-free) creatinine equation, mL/min/1.73m², one decimal.
 */
export function ckdEpi2021(creatinineMgDl: number, age: number, sex: Sex): number {
  const kappa = sex === 'female' ? 0.7 : 0.9;
  const alpha = sex === 'female' ? -0.241 : -0.302;
  const ratio = creatinineMgDl / kappa;

  const egfr =
    142 *
    Math.pow(Math.min(ratio, 1), alpha) *
    Math.pow(Math.max(ratio, 1), -1.2) *
    Math.pow(0.9938, age) *
    (sex === 'female' ? 1.012 : 1);

  return Math.round(egfr * 10) / 10;
}

interface RangeRule {
  field: string;
  name: string;
  priority: CheckPriority;
  /** Returns a message when the value is out of range */
  flag: (value: number) => string | null;
}

const RANGE_RULES: RangeRule[] = [
  {
    field: 'creatinine_mg_dl',
    name: 'creatinine',
    priority: 'required',
    flag: (v) => (v > 1.5 ? `Creatinine ${v} mg/dL is elevated` : null),
  },
  {
    field: 'potassium_mmol_l',
    name: 'potassium',
    priority: 'optional',
    flag: (v) => (v < 3.5 || v > 5.5 ? `Potassium ${v} mmol/L is outside 3.5-5.5` : null),
  },
  {
    field: 'bun_mg_dl',
    name: 'bun',
    priority: 'optional',
    flag: (v) => (v > 20 ? `BUN ${v} mg/dL is elevated` : null),
  },
  {
    field: 'bmi',
    name: 'bmi',
    priority: 'optional',
    flag: (v) => (v >= 40 ? `BMI ${v} may exceed table or bore limits` : null),
  },
];

function rangeCheck(rule: RangeRule, record: PatientRecord): ToolCheck {
  const value = readLabValue(record[rule.field]);
  if (value === null) {
    return { name: rule.name, status: 'missing', priority: rule.priority };
  }
  const message = rule.flag(value);
  return message
    ? { name: rule.name, status: 'flagged', priority: rule.priority, value, message }
    : { name: rule.name, status: 'ok', priority: rule.priority, value };
}

function contrastRisk(egfr: number | null): ContrastRisk {
  if (egfr === null) return 'unknown';
  if (egfr < 30) return 'high';
  if (egfr < 45) return 'moderate';
  return 'low';
}

export class RenalRuleEvaluator implements RuleEvaluator {
  readonly toolName = 'renal';

  async evaluate(record: PatientRecord): Promise<RenalToolOutput> {
    const checks = RANGE_RULES.map((rule) => rangeCheck(rule, record));

    const reported = readLabValue(record.egfr_ckd_epi);
    let egfr: number | null = reported;
    let source: RenalToolOutput['egfr_source'] = reported === null ? 'unavailable' : 'reported';

    if (egfr === null) {
      const creatinine = readLabValue(record.creatinine_mg_dl);
      const age = readLabValue(record.age);
      const sex = readSex(record);
      if (creatinine !== null && creatinine > 0 && age !== null && sex !== null) {
        egfr = ckdEpi2021(creatinine, age, sex);
        source = 'computed';
      }
    }

    const risk = contrastRisk(egfr);
    if (egfr === null) {
      checks.push({ name: 'egfr', status: 'missing', priority: 'required' });
    } else if (risk === 'low') {
      checks.push({ name: 'egfr', status: 'ok', priority: 'required', value: egfr });
    } else {
      checks.push({
        name: 'egfr',
        status: 'flagged',
        priority: 'required',
        value: egfr,
        message:
          risk === 'high'
            ? `eGFR ${egfr} is below 30: avoid iodinated contrast unless essential`
            : `eGFR ${egfr} is 30-44: weigh contrast risk against benefit`,
      });
    }

    return {
      tool: this.toolName,
      checks,
      egfr,
      egfr_source: source,
      contrast_risk: risk,
    };
  }
}
