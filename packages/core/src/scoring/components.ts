import {
  CoverageAssessment,
  CriterionAnalysis,
  GeneralAssessment,
  QualityFinding,
  ScoreComponent,
} from '../types.js';

export const COMPONENT_WEIGHTS = {
  acceptanceCriteria: 0.4,
  quality: 0.3,
  coverage: 0.2,
  generalAssessment: 0.1,
} as const;

/**
 * Evaluate how well the acceptance criteria are met.
 *
 * Weight: 0.4
 * Score: (fulfilled / total) * mean confidence; 0 when there are no criteria.
 */
export function evaluateAcceptanceCriteriaComponent(
  criteria: readonly CriterionAnalysis[],
): ScoreComponent {
  if (criteria.length === 0) {
    return {
      name: 'Acceptance criteria',
      score: 0,
      weight: COMPONENT_WEIGHTS.acceptanceCriteria,
      description: 'No acceptance criteria to evaluate.',
    };
  }

  const fulfilled = criteria.filter((c) => c.fulfilled).length;
  const meanConfidence = criteria.reduce((sum, c) => sum + c.confidence, 0) / criteria.length;
  const score = (fulfilled / criteria.length) * meanConfidence;

  const unmet = criteria
    .filter((c) => !c.fulfilled)
    .map((c) => `Unmet (${Math.round(c.confidence * 100)}% confidence): ${c.criterion}`);

  return {
    name: 'Acceptance criteria',
    score,
    weight: COMPONENT_WEIGHTS.acceptanceCriteria,
    description: `${fulfilled}/${criteria.length} criteria fulfilled, mean confidence ${Math.round(meanConfidence * 100)}%.`,
    ...(unmet.length > 0 ? { details: unmet } : {}),
  };
}

/**
 * Evaluate the heuristic quality findings.
 *
 * Weight: 0.3
 * Score: 1 - 0.1 per finding, floored at 0.
 */
export function evaluateQualityComponent(findings: readonly QualityFinding[]): ScoreComponent {
  const score = Math.max(0, 1 - 0.1 * findings.length);

  const counts = new Map<string, number>();
  for (const finding of findings) {
    counts.set(finding.kind, (counts.get(finding.kind) ?? 0) + 1);
  }
  const details = [...counts].map(([kind, count]) => `${kind}: ${count}`);

  return {
    name: 'Code quality',
    score,
    weight: COMPONENT_WEIGHTS.quality,
    description:
      findings.length === 0
        ? 'No quality findings.'
        : `${findings.length} quality finding${findings.length === 1 ? '' : 's'}.`,
    ...(details.length > 0 ? { details } : {}),
  };
}

/**
 * Evaluate whether the change carries tests.
 *
 * Weight: 0.2
 * Score: 1.0 with tests, 0.3 without.
 */
export function evaluateCoverageComponent(coverage: CoverageAssessment): ScoreComponent {
  return {
    name: 'Test coverage',
    score: coverage.hasTests ? 1.0 : 0.3,
    weight: COMPONENT_WEIGHTS.coverage,
    description: coverage.recommendation,
  };
}

/**
 * Evaluate the general AI assessment.
 *
 * Weight: 0.1
 * Score: 0.8 minus 0.1 per security or performance issue, floored at 0.
 */
export function evaluateGeneralAssessmentComponent(assessment: GeneralAssessment): ScoreComponent {
  const issues = [...assessment.securityIssues, ...assessment.performanceConcerns];
  const score = Math.max(0, 0.8 - 0.1 * issues.length);

  return {
    name: 'General assessment',
    score,
    weight: COMPONENT_WEIGHTS.generalAssessment,
    description:
      issues.length === 0
        ? 'No security or performance issues reported.'
        : `${issues.length} security/performance issue${issues.length === 1 ? '' : 's'} reported.`,
    ...(issues.length > 0 ? { details: issues } : {}),
  };
}
