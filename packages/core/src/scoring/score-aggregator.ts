import {
  CoverageAssessment,
  CriterionAnalysis,
  GeneralAssessment,
  QualityFinding,
  ReviewStatus,
  ScoreResult,
} from '../types.js';
import {
  evaluateAcceptanceCriteriaComponent,
  evaluateQualityComponent,
  evaluateCoverageComponent,
  evaluateGeneralAssessmentComponent,
} from './components.js';

/** More findings than this fail the review outright. */
export const QUALITY_FINDING_HARD_CAP = 5;

/** An unmet criterion judged with more confidence than this blocks the review. */
export const BLOCKING_CONFIDENCE = 0.7;

export const PASS_THRESHOLD = 0.8;
export const CONDITIONAL_THRESHOLD = 0.6;

export function clampScore(score: number): number {
  if (Number.isNaN(score)) return 0;
  return Math.min(1, Math.max(0, score));
}

/**
 * Decide the verdict. Rules are checked in order and the first match wins,
 * so both hard blocks override any score:
 *
 *   1. fail        if findings > 5
 *   2. fail        if an unmet criterion has confidence > 0.7
 *   3. pass        if score >= 0.8
 *   4. conditional if score >= 0.6
 *   5. fail        otherwise
 */
export function determineStatus(
  score: number,
  criteria: readonly CriterionAnalysis[],
  findings: readonly QualityFinding[],
): ReviewStatus {
  if (findings.length > QUALITY_FINDING_HARD_CAP) return 'fail';
  if (criteria.some((c) => !c.fulfilled && c.confidence > BLOCKING_CONFIDENCE)) return 'fail';
  if (score >= PASS_THRESHOLD) return 'pass';
  if (score >= CONDITIONAL_THRESHOLD) return 'conditional';
  return 'fail';
}

/**
 * Combine the four weighted components into one score and a verdict.
 *
 * Formula: score = clamp(sum(component_score * component_weight), 0, 1)
 *
 * The weights sum to 1 and are fixed; the score is not rounded.
 */
export function calculateScore(
  criteria: readonly CriterionAnalysis[],
  findings: readonly QualityFinding[],
  coverage: CoverageAssessment,
  generalAssessment: GeneralAssessment,
): ScoreResult {
  const components = [
    evaluateAcceptanceCriteriaComponent(criteria),
    evaluateQualityComponent(findings),
    evaluateCoverageComponent(coverage),
    evaluateGeneralAssessmentComponent(generalAssessment),
  ];

  const score = clampScore(
    components.reduce((sum, component) => sum + component.score * component.weight, 0),
  );

  return {
    score,
    status: determineStatus(score, criteria, findings),
    components,
  };
}
