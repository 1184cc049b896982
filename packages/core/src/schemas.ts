import { z } from 'zod';

/**
 * Models routinely send `null` for "nothing to report"; treat it like an
 * absent field so the default applies.
 */
const nullToUndefined = (value: unknown): unknown => (value === null ? undefined : value);

/** "true" / "false" sent as strings. */
const booleanLike = (value: unknown): unknown => {
  if (typeof value !== 'string') return nullToUndefined(value);
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true') return true;
  if (normalized === 'false') return false;
  return value;
};

/** A list of strings, also accepting a lone string. */
const stringList = z.union([
  z.array(z.string()),
  z.string().transform((s) => (s.trim() ? [s] : [])),
]);

// ── Model response records ──
// Once a record is found, a malformed field falls back to its default; the
// rest of the record is kept.

export const criterionResponseSchema = z.object({
  fulfilled: z.preprocess(booleanLike, z.boolean().catch(false)),
  confidence: z.preprocess(nullToUndefined, z.coerce.number().catch(0.5)),
  evidence: z.preprocess(nullToUndefined, stringList.catch([])),
  gaps: z.preprocess(nullToUndefined, stringList.catch([])),
  reasoning: z.preprocess(nullToUndefined, z.string().catch('')),
});

export const generalAssessmentResponseSchema = z.object({
  security_issues: z.preprocess(nullToUndefined, stringList.catch([])),
  performance_concerns: z.preprocess(nullToUndefined, stringList.catch([])),
  maintainability_issues: z.preprocess(nullToUndefined, stringList.catch([])),
  positive_aspects: z.preprocess(nullToUndefined, stringList.catch([])),
  overall_assessment: z.preprocess(nullToUndefined, z.string().catch('')),
});

// ── Serialized review result ──

const unitInterval = z.number().min(0).max(1);

export const criterionAnalysisSchema = z.object({
  criterion: z.string(),
  fulfilled: z.boolean(),
  confidence: unitInterval,
  evidence: z.array(z.string()),
  gaps: z.array(z.string()),
  reasoning: z.string(),
});

export const qualityFindingSchema = z.object({
  path: z.string(),
  kind: z.enum(['fail-keyword', 'long-line', 'deep-nesting', 'commented-code', 'hardcoded-literal']),
  message: z.string(),
  line: z.number().int().positive().optional(),
  keyword: z.string().optional(),
});

export const coverageAssessmentSchema = z.object({
  hasTests: z.boolean(),
  testFileCount: z.number().int().nonnegative(),
  codeFileCount: z.number().int().nonnegative(),
  testToCodeRatio: z.number().nonnegative(),
  testFiles: z.array(z.string()),
  recommendation: z.string(),
});

export const generalAssessmentSchema = z.object({
  securityIssues: z.array(z.string()),
  performanceConcerns: z.array(z.string()),
  maintainabilityIssues: z.array(z.string()),
  positiveAspects: z.array(z.string()),
  overallAssessment: z.string(),
});

export const scoreComponentSchema = z.object({
  name: z.string(),
  score: z.number(),
  weight: z.number(),
  description: z.string(),
  details: z.array(z.string()).optional(),
});

export const reviewResultSchema = z.object({
  status: z.enum(['pass', 'conditional', 'fail']),
  overallScore: unitInterval,
  summary: z.string(),
  components: z.array(scoreComponentSchema),
  criteria: z.array(criterionAnalysisSchema),
  findings: z.array(qualityFindingSchema),
  coverage: coverageAssessmentSchema,
  generalAssessment: generalAssessmentSchema,
  suggestions: z.array(z.string()),
  requiredChanges: z.array(z.string()),
  recommendedTests: z.array(z.string()),
  verdictComment: z.string().optional(),
});

export const reviewMetadataSchema = z.object({
  ticketKey: z.string(),
  ticketSummary: z.string(),
  prNumber: z.number().int().optional(),
  prTitle: z.string(),
  author: z.string(),
  reviewedAt: z.string(),
});

export const reviewReportSchema = z.object({
  version: z.literal('1.0'),
  metadata: reviewMetadataSchema.optional(),
  result: reviewResultSchema,
});
