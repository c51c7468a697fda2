/**
 * Field Normalizer
 *
 * Rewrites record keys to canonical names. Values are never touched.
 */

import type { PatientRecord, RawRecord } from '../types.js';

/**
 * Synonym → canonical field name. Keys are lower-case and trimmed.
 */
export const FIELD_ALIASES: Readonly<Record<string, string>> = {
  // potassium
  potassium_meq_l: 'potassium_mmol_l',
  k_meq_l: 'potassium_mmol_l',
  k_mmol_l: 'potassium_mmol_l',
  potassium: 'potassium_mmol_l',
  serum_potassium: 'potassium_mmol_l',

  // bun
  bun: 'bun_mg_dl',
  bun_mmol_l: 'bun_mg_dl',
  bun_mgdl: 'bun_mg_dl',

  // creatinine
  creatinine: 'creatinine_mg_dl',
  creatinine_mgdl: 'creatinine_mg_dl',
  serum_creatinine: 'creatinine_mg_dl',
  cr: 'creatinine_mg_dl',

  // egfr
  gfr: 'egfr_ckd_epi',
  egfr: 'egfr_ckd_epi',
  estimated_gfr: 'egfr_ckd_epi',

  // bmi
  body_mass_index: 'bmi',
  body_mass_idx: 'bmi',
};

export function canonicalFieldName(key: string): string {
  const lowered = key.toLowerCase().trim();
  return FIELD_ALIASES[lowered] ?? lowered;
}

/**
 * Map every key to its canonical name. When two input keys land on the same
 * canonical name the later one wins.
 */
export function normalizeFields(record: RawRecord): PatientRecord {
  const normalized: PatientRecord = {};
  for (const [key, value] of Object.entries(record)) {
    normalized[canonicalFieldName(key)] = value;
  }
  return normalized;
}
