import {
  CoverageAssessment,
  CriterionAnalysis,
  DiffSummary,
  GeneralAssessment,
  QualityFinding,
  Recommendations,
  ReviewStatus,
} from '../types.js';
import { QUALITY_FINDING_HARD_CAP } from '../scoring/score-aggregator.js';

export const MAX_SUGGESTIONS = 10;
export const MAX_RECOMMENDED_TESTS = 5;

/** Stricter than the blocking threshold used for the verdict. */
export const REQUIRED_CHANGE_CONFIDENCE = 0.8;

const CRITERION_EXCERPT_LENGTH = 50;

export const VERDICT_COMMENTS = {
  excellent: 'LGTM! 🚀 Excellent implementation that fully meets requirements with great code quality.',
  solid: 'LGTM! ✅ Solid implementation that meets requirements with good practices.',
  standard: 'LGTM! ✅ Implementation meets requirements.',
} as const;

/**
 * Gaps of unmet criteria first, then quality findings, then the general
 * review's maintainability and performance items.
 */
export function generateSuggestions(
  criteria: readonly CriterionAnalysis[],
  findings: readonly QualityFinding[],
  assessment: GeneralAssessment,
): string[] {
  const suggestions: string[] = [];

  for (const analysis of criteria) {
    if (!analysis.fulfilled) suggestions.push(...analysis.gaps);
  }
  for (const finding of findings) {
    suggestions.push(`${finding.path}: ${finding.message}`);
  }
  suggestions.push(...assessment.maintainabilityIssues, ...assessment.performanceConcerns);

  return suggestions.slice(0, MAX_SUGGESTIONS);
}

export function identifyRequiredChanges(
  criteria: readonly CriterionAnalysis[],
  findings: readonly QualityFinding[],
): string[] {
  const required = criteria
    .filter((c) => !c.fulfilled && c.confidence > REQUIRED_CHANGE_CONFIDENCE)
    .map((c) => `Must fulfill: ${c.criterion}`);

  const markers = new Set<string>();
  for (const finding of findings) {
    if (finding.kind === 'fail-keyword' && finding.keyword) markers.add(finding.keyword);
  }

  if (markers.size > 0) {
    required.push(`Remove debugging/temporary code (${[...markers].join(', ')})`);
  } else if (findings.length > QUALITY_FINDING_HARD_CAP) {
    // A quality hard-fail must always come with something to fix.
    required.push(
      `Resolve code quality findings (${findings.length} found, at most ${QUALITY_FINDING_HARD_CAP} allowed)`,
    );
  }

  return required;
}

function excerptCriterion(criterion: string): string {
  return criterion.length > CRITERION_EXCERPT_LENGTH
    ? `${criterion.slice(0, CRITERION_EXCERPT_LENGTH)}...`
    : criterion;
}

export function recommendTests(
  criteria: readonly string[],
  diff: DiffSummary,
  coverage: CoverageAssessment,
): string[] {
  const tests: string[] = [];

  if (!coverage.hasTests) {
    tests.push('Add unit tests for the main functionality');
  }
  for (const criterion of criteria) {
    tests.push(`Test case for: ${excerptCriterion(criterion)}`);
  }
  for (const file of diff.files) {
    if (file.changeKind === 'added' && file.isTestFile !== true) {
      tests.push(`Add tests for new file: ${file.path}`);
    }
  }

  return tests.slice(0, MAX_RECOMMENDED_TESTS);
}

/**
 * Fixed approval message for passing reviews, picked by score tier.
 */
export function generateVerdictComment(status: ReviewStatus, score: number): string | undefined {
  if (status !== 'pass') return undefined;
  if (score >= 0.95) return VERDICT_COMMENTS.excellent;
  if (score >= 0.85) return VERDICT_COMMENTS.solid;
  return VERDICT_COMMENTS.standard;
}

export function generateRecommendations(input: {
  criteria: readonly CriterionAnalysis[];
  findings: readonly QualityFinding[];
  coverage: CoverageAssessment;
  generalAssessment: GeneralAssessment;
  diff: DiffSummary;
  status: ReviewStatus;
  score: number;
}): Recommendations {
  const verdictComment = generateVerdictComment(input.status, input.score);

  return {
    suggestions: generateSuggestions(input.criteria, input.findings, input.generalAssessment),
    requiredChanges: identifyRequiredChanges(input.criteria, input.findings),
    recommendedTests: recommendTests(
      input.criteria.map((c) => c.criterion),
      input.diff,
      input.coverage,
    ),
    ...(verdictComment !== undefined ? { verdictComment } : {}),
  };
}
