import { CriterionVerdict, GeneralAssessment } from '../types.js';
import { criterionResponseSchema, generalAssessmentResponseSchema } from '../schemas.js';

/** Characters of a raw response kept when it cannot be decoded. */
export const RAW_EXCERPT_LENGTH = 200;

export const UNPARSEABLE_RESPONSE_GAP = 'Could not parse AI response';

export interface ParsedResponse<T> {
  value: T;
  /** Which decode stage produced the value. */
  stage: 'structured' | 'heuristic';
}

function excerpt(raw: string): string {
  return raw.length > RAW_EXCERPT_LENGTH ? `${raw.slice(0, RAW_EXCERPT_LENGTH)}...` : raw;
}

function clampUnit(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

function parseJsonObject(text: string): Record<string, unknown> | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return undefined;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return undefined;
  }
  return Object.fromEntries(Object.entries(parsed));
}

/**
 * Locate the single JSON record a response is expected to carry. Tried in
 * order: the whole response, the first fenced code block, and the span from
 * the first '{' to the last '}'.
 */
export function extractJsonRecord(raw: string): Record<string, unknown> | undefined {
  const trimmed = raw.trim();
  const candidates = [trimmed];

  const fenced = trimmed.match(/```(?:json)?\s*([\s\S]*?)```/i);
  if (fenced) candidates.push(fenced[1].trim());

  const start = trimmed.indexOf('{');
  const end = trimmed.lastIndexOf('}');
  if (start !== -1 && end > start) candidates.push(trimmed.slice(start, end + 1));

  for (const candidate of candidates) {
    const record = parseJsonObject(candidate);
    if (record) return record;
  }
  return undefined;
}

// ── Criterion responses ──

export function decodeCriterionResponse(raw: string): CriterionVerdict | undefined {
  const record = extractJsonRecord(raw);
  if (!record) return undefined;

  const result = criterionResponseSchema.safeParse(record);
  if (!result.success) return undefined;

  return {
    fulfilled: result.data.fulfilled,
    confidence: clampUnit(result.data.confidence),
    evidence: result.data.evidence,
    gaps: result.data.gaps,
    reasoning: result.data.reasoning,
  };
}

const FULFILLED_FIELD = /"fulfilled"\s*:\s*"?(true|false)\b/i;

/**
 * Last-resort reading of a free-text answer: any mention of "fulfilled"
 * (case-insensitive) counts as fulfilled, at a neutral confidence. A
 * `"fulfilled": <bool>` pair left in a broken record is read as written.
 */
export function extractCriterionHeuristically(raw: string): CriterionVerdict {
  const field = raw.match(FULFILLED_FIELD);
  return {
    fulfilled: field ? field[1].toLowerCase() === 'true' : raw.toLowerCase().includes('fulfilled'),
    confidence: 0.5,
    evidence: [],
    gaps: [UNPARSEABLE_RESPONSE_GAP],
    reasoning: excerpt(raw),
  };
}

export function parseCriterionResponse(raw: string): ParsedResponse<CriterionVerdict> {
  const decoded = decodeCriterionResponse(raw);
  return decoded
    ? { value: decoded, stage: 'structured' }
    : { value: extractCriterionHeuristically(raw), stage: 'heuristic' };
}

// ── General assessment responses ──

export function decodeGeneralAssessment(raw: string): GeneralAssessment | undefined {
  const record = extractJsonRecord(raw);
  if (!record) return undefined;

  const result = generalAssessmentResponseSchema.safeParse(record);
  if (!result.success) return undefined;

  return {
    securityIssues: result.data.security_issues,
    performanceConcerns: result.data.performance_concerns,
    maintainabilityIssues: result.data.maintainability_issues,
    positiveAspects: result.data.positive_aspects,
    overallAssessment: result.data.overall_assessment,
  };
}

export function extractGeneralAssessmentHeuristically(raw: string): GeneralAssessment {
  return {
    securityIssues: [],
    performanceConcerns: [],
    maintainabilityIssues: [],
    positiveAspects: [],
    overallAssessment: excerpt(raw),
  };
}

export function parseGeneralAssessmentResponse(raw: string): ParsedResponse<GeneralAssessment> {
  const decoded = decodeGeneralAssessment(raw);
  return decoded
    ? { value: decoded, stage: 'structured' }
    : { value: extractGeneralAssessmentHeuristically(raw), stage: 'heuristic' };
}
