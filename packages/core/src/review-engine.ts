import {
  CoverageAssessment,
  CriterionAnalysis,
  DiffSummary,
  ModelBackend,
  QualityConfig,
  QualityFinding,
  ReviewLogger,
  ReviewResult,
  ReviewStatus,
  TicketInfo,
} from './types.js';
import { classifyTestFiles, assessCoverage } from './coverage/coverage-classifier.js';
import { scanDiffQuality } from './quality/quality-scanner.js';
import { evaluateCriteria } from './ai/criterion-evaluator.js';
import { assessChange } from './ai/general-assessment.js';
import { calculateScore } from './scoring/score-aggregator.js';
import { generateRecommendations } from './recommendations/recommendation-generator.js';
import { formatPercent } from './output/format.js';

export interface ReviewEngineOptions {
  backend: ModelBackend;
  logger?: ReviewLogger;
}

export interface ReviewEngine {
  review(ticket: TicketInfo, diff: DiffSummary, qualityConfig: QualityConfig): Promise<ReviewResult>;
}

/**
 * Build a short human-readable summary of the review.
 */
function generateSummary(
  status: ReviewStatus,
  score: number,
  criteria: readonly CriterionAnalysis[],
  findings: readonly QualityFinding[],
  coverage: CoverageAssessment,
): string {
  const fulfilled = criteria.filter((c) => c.fulfilled).length;
  const parts: string[] = [];

  parts.push(`Review ${status.toUpperCase()} with an overall score of ${formatPercent(score)}.`);
  parts.push(`${fulfilled}/${criteria.length} acceptance criteria fulfilled.`);
  parts.push(`${findings.length} code quality finding${findings.length === 1 ? '' : 's'}.`);
  parts.push(
    coverage.hasTests
      ? `Tests included (${coverage.testFileCount} test file${coverage.testFileCount === 1 ? '' : 's'}).`
      : 'No tests included.',
  );

  return parts.join(' ');
}

/**
 * Review one change against one ticket and produce the verdict.
 *
 * Steps:
 *   1. Classify test files the diff source left unflagged
 *   2. Scan added lines for quality findings and assess test coverage
 *   3. Evaluate every acceptance criterion and the general assessment
 *      concurrently; backend failures degrade the affected unit only
 *   4. Score and decide the status
 *   5. Derive suggestions, required changes and recommended tests
 *   6. Summarize and assemble the result
 */
export async function reviewChange(
  ticket: TicketInfo,
  diff: DiffSummary,
  qualityConfig: QualityConfig,
  options: ReviewEngineOptions,
): Promise<ReviewResult> {
  const { backend, logger } = options;
  const label = diff.number !== undefined ? `PR #${diff.number}` : diff.title;
  logger?.debug(`Reviewing ${label} against ${ticket.key} with ${backend.provider}/${backend.model}`);

  // --- 1. Classify --------------------------------------------------------
  const classified: DiffSummary = { ...diff, files: classifyTestFiles(diff.files, qualityConfig.testPatterns) };

  // --- 2. Heuristics --------------------------------------------------------
  const findings = scanDiffQuality(classified, qualityConfig.failKeywords);
  const coverage = assessCoverage(classified);
  logger?.debug(`${findings.length} quality finding(s); ${coverage.testFileCount} test file(s)`);

  // --- 3. Model-backed evaluation -----------------------------------------
  logger?.debug(`Evaluating ${ticket.acceptanceCriteria.length} acceptance criteria`);
  const [criteria, generalAssessment] = await Promise.all([
    evaluateCriteria(backend, ticket.acceptanceCriteria, classified, logger),
    assessChange(backend, ticket, classified, logger),
  ]);

  // --- 4. Score -------------------------------------------------------------
  const { score, status, components } = calculateScore(criteria, findings, coverage, generalAssessment);
  logger?.debug(`Score ${formatPercent(score)} -> ${status}`);

  // --- 5. Recommendations ---------------------------------------------------
  const recommendations = generateRecommendations({
    criteria,
    findings,
    coverage,
    generalAssessment,
    diff: classified,
    status,
    score,
  });

  // --- 6. Assemble ----------------------------------------------------------
  return {
    status,
    overallScore: score,
    summary: generateSummary(status, score, criteria, findings, coverage),
    components,
    criteria,
    findings,
    coverage,
    generalAssessment,
    suggestions: recommendations.suggestions,
    requiredChanges: recommendations.requiredChanges,
    recommendedTests: recommendations.recommendedTests,
    ...(recommendations.verdictComment !== undefined ? { verdictComment: recommendations.verdictComment } : {}),
  };
}

/**
 * Bind a backend (and optional logger) once; each `review` call is
 * independent and shares no state with other calls.
 */
export function createReviewEngine(options: ReviewEngineOptions): ReviewEngine {
  return {
    review: (ticket, diff, qualityConfig) => reviewChange(ticket, diff, qualityConfig, options),
  };
}
