// ── Ticket layer ──
export interface TicketInfo {
  key: string;
  summary: string;
  problemDescription: string;
  acceptanceCriteria: string[];
  linkedPrs: string[];
  status: string;
  priority: string;
  issueType: string;
}

// ── Diff layer ──
export type ChangeKind = 'added' | 'modified' | 'removed';

export interface FileChange {
  path: string;
  changeKind: ChangeKind;
  additions: number;
  deletions: number;
  /** Unified diff hunks for the file; absent for binary or truncated diffs. */
  patch?: string;
  /** Left unset by a source that does not classify; the engine then applies the configured test patterns. */
  isTestFile?: boolean;
}

export interface DiffSummary {
  number?: number;
  title: string;
  description: string;
  author: string;
  state: string;
  baseBranch: string;
  headBranch: string;
  files: FileChange[];
}

export interface DiffTotals {
  filesChanged: number;
  additions: number;
  deletions: number;
}

// ── Review configuration ──
export interface QualityConfig {
  failKeywords: string[];
  testPatterns: string[];
}

// ── Criterion layer ──
export interface CriterionAnalysis {
  readonly criterion: string;
  readonly fulfilled: boolean;
  readonly confidence: number;
  readonly evidence: readonly string[];
  readonly gaps: readonly string[];
  readonly reasoning: string;
}

/** A criterion verdict before it is paired with the criterion text. */
export type CriterionVerdict = Omit<CriterionAnalysis, 'criterion'>;

// ── Quality layer ──
export type FindingKind =
  | 'fail-keyword'
  | 'long-line'
  | 'deep-nesting'
  | 'commented-code'
  | 'hardcoded-literal';

export interface QualityFinding {
  readonly path: string;
  readonly kind: FindingKind;
  readonly message: string;
  readonly line?: number;
  /** Set on fail-keyword findings. */
  readonly keyword?: string;
}

// ── Coverage layer ──
export interface CoverageAssessment {
  readonly hasTests: boolean;
  readonly testFileCount: number;
  readonly codeFileCount: number;
  readonly testToCodeRatio: number;
  readonly testFiles: readonly string[];
  readonly recommendation: string;
}

// ── General assessment layer ──
export interface GeneralAssessment {
  readonly securityIssues: readonly string[];
  readonly performanceConcerns: readonly string[];
  readonly maintainabilityIssues: readonly string[];
  readonly positiveAspects: readonly string[];
  readonly overallAssessment: string;
}

// ── Scoring layer ──
export type ReviewStatus = 'pass' | 'conditional' | 'fail';

export interface ScoreComponent {
  readonly name: string;
  /** Component score in [0, 1]. */
  readonly score: number;
  readonly weight: number;
  readonly description: string;
  readonly details?: readonly string[];
}

export interface ScoreResult {
  readonly score: number;
  readonly status: ReviewStatus;
  readonly components: readonly ScoreComponent[];
}

// ── Recommendations ──
export interface Recommendations {
  readonly suggestions: readonly string[];
  readonly requiredChanges: readonly string[];
  readonly recommendedTests: readonly string[];
  readonly verdictComment?: string;
}

// ── Top-level review result ──
export interface ReviewResult {
  readonly status: ReviewStatus;
  readonly overallScore: number;
  readonly summary: string;
  readonly components: readonly ScoreComponent[];
  readonly criteria: readonly CriterionAnalysis[];
  readonly findings: readonly QualityFinding[];
  readonly coverage: CoverageAssessment;
  readonly generalAssessment: GeneralAssessment;
  readonly suggestions: readonly string[];
  readonly requiredChanges: readonly string[];
  readonly recommendedTests: readonly string[];
  readonly verdictComment?: string;
}

/** Context rendered next to a result; not part of the decision. */
export interface ReviewMetadata {
  ticketKey: string;
  ticketSummary: string;
  prNumber?: number;
  prTitle: string;
  author: string;
  reviewedAt: string;
}

// ── Model backend ──
export type ProviderId = 'anthropic' | 'openai' | 'ollama';

/**
 * The text-completion capability the evaluators depend on. Every variant
 * reports failures as a BackendError.
 */
export interface ModelBackend {
  readonly provider: ProviderId;
  readonly model: string;
  complete(prompt: string): Promise<string>;
}

// ── Engine collaborators ──
export interface ReviewLogger {
  debug(message: string): void;
  warn(message: string): void;
}
