/**
 * Prompt builders for the LLM-backed collaborators.
 *
 * Every prompt asks for a single JSON object; the provider layer also sends
 * "Return only valid JSON." as the system message.
 */

import type { CandidateOutput, PatientRecord, RawRecord, ReviewFeedback, ToolOutput } from '../types.js';

function block(label: string, value: unknown): string {
  return `${label}:\n${JSON.stringify(value, null, 2)}\n\n`;
}

export const CONTEXT_KEY = 'enhanced_context';

export function buildContextPrompt(record: RawRecord): string {
  return (
    'You are preparing background for an imaging protocol recommendation.\n' +
    'Summarize the clinically relevant facts in the patient data: indication, renal function, ' +
    'contrast allergies, prior imaging and anything that constrains protocol choice.\n' +
    `Return ONLY JSON with a single key '${CONTEXT_KEY}' holding the summary as a string.\n\n` +
    block('Patient data', record)
  );
}

export function buildGenerationPrompt(
  record: RawRecord,
  context: string,
  feedback: ReviewFeedback | null,
): string {
  let prompt =
    'You are an imaging protocol specialist.\n' +
    'Given patient data and background context, recommend an imaging protocol.\n' +
    'Output JSON with: protocol_selection (array of {name, contrast, rationale}), ' +
    'recommendations (array of strings), rationale (string).\n\n' +
    block('Patient data', record) +
    `Context:\n${context}\n\n`;

  if (feedback) {
    prompt +=
      'A reviewer assessed your previous recommendation. Address every issue and ' +
      'apply the recommendations where appropriate.\n\n' +
      block('Reviewer feedback', feedback);
  }

  return prompt;
}

export function buildReviewPrompt(
  raw: RawRecord,
  normalized: PatientRecord,
  toolOutputs: Record<string, ToolOutput>,
  candidate: CandidateOutput,
): string {
  let prompt =
    'You are a clinical imaging protocol reviewer.\n' +
    'Given patient data, rule-check output, and protocol suggestions from another agent,\n' +
    'verify appropriateness, suggest changes, and output JSON with: issues, recommendations, confidence.\n\n' +
    block('Patient data', raw) +
    block('Normalized patient data', normalized);

  for (const [tool, output] of Object.entries(toolOutputs)) {
    prompt += block(`${tool} tool output`, output);
  }

  return prompt + block('Proposed protocol', candidate);
}

export function buildScorePrompt(
  scoreKey: string,
  candidate: CandidateOutput,
  record: PatientRecord,
  toolOutput: ToolOutput,
): string {
  return (
    'You are evaluating the quality of imaging protocol recommendations from another agent.\n' +
    'Given patient data and rule-check results, assess the correctness and appropriateness of the proposal.\n' +
    `Return ONLY JSON with a single key '${scoreKey}' between 0 and 1.\n\n` +
    block('Patient data', record) +
    block(`${toolOutput.tool} tool output`, toolOutput) +
    block('Proposal', candidate) +
    `Example:\n{"${scoreKey}": 0.87}`
  );
}

export function buildExportPrompt(finalOutput: CandidateOutput): string {
  return (
    'Convert the following JSON into a FHIR R4 Bundle in JSON format.\n' +
    '- Use CarePlan for "recommendations" and "rationale".\n' +
    '- Use PlanDefinition for each "protocol_selection".\n' +
    '- Wrap everything in a Bundle (type=collection).\n' +
    '- Ensure resourceType, id, and required FHIR fields are included.\n' +
    '- Return only the JSON for the Bundle (no commentary).\n\n' +
    block('Input JSON', finalOutput)
  );
}
