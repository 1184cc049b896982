export type {
  TicketInfo,
  ChangeKind,
  FileChange,
  DiffSummary,
  DiffTotals,
  QualityConfig,
  CriterionAnalysis,
  CriterionVerdict,
  FindingKind,
  QualityFinding,
  CoverageAssessment,
  GeneralAssessment,
  ReviewStatus,
  ScoreComponent,
  ScoreResult,
  Recommendations,
  ReviewResult,
  ReviewMetadata,
  ProviderId,
  ModelBackend,
  ReviewLogger,
} from './types.js';
export type { BackendConfig } from './ai/model-backend.js';
export type { ReviewEngine, ReviewEngineOptions } from './review-engine.js';

export { createReviewEngine, reviewChange } from './review-engine.js';
export type { FetchSource } from './errors.js';
export { ReviewGateError, BackendError, FetchError, ConfigError, errorMessage } from './errors.js';
export { createModelBackend, PROVIDERS, DEFAULT_MODELS, DEFAULT_OLLAMA_BASE_URL, API_KEY_ENV } from './ai/model-backend.js';
export { evaluateCriterion, evaluateCriteria } from './ai/criterion-evaluator.js';
export { assessChange } from './ai/general-assessment.js';
export { parseCriterionResponse, parseGeneralAssessmentResponse } from './ai/response-parser.js';
export { scanDiffQuality } from './quality/quality-scanner.js';
export { assessCoverage, classifyTestFiles } from './coverage/coverage-classifier.js';
export { createTestFileMatcher, isTestFile } from './coverage/test-file-matcher.js';
export { extractAddedLines } from './diff/patch-parser.js';
export { summarizeDiff } from './diff/diff-stats.js';
export { calculateScore, determineStatus } from './scoring/score-aggregator.js';
export { generateRecommendations } from './recommendations/recommendation-generator.js';
export { formatMarkdown } from './output/markdown-reporter.js';
export { formatJSON, parseReviewJSON } from './output/json-reporter.js';
export { formatPercent } from './output/format.js';
