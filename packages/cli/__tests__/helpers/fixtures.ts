import type { DiffSummary, ReviewResult, TicketInfo } from '@review-gate/core';

export function makeTicket(overrides: Partial<TicketInfo> = {}): TicketInfo {
  return {
    key: 'AUTH-12',
    summary: 'Throttle logins',
    problemDescription: 'Brute force attempts are not limited.',
    acceptanceCriteria: ['Lock after 5 attempts', 'Show remaining attempts'],
    linkedPrs: ['https://github.com/acme/web/pull/42'],
    status: 'In Review',
    priority: 'High',
    issueType: 'Story',
    ...overrides,
  };
}

export function makeDiff(overrides: Partial<DiffSummary> = {}): DiffSummary {
  return {
    number: 42,
    title: 'Add login throttling',
    description: 'Implements AUTH-12',
    author: 'dev',
    state: 'open',
    baseBranch: 'main',
    headBranch: 'feature/lockout',
    files: [
      { path: 'src/lockout.ts', changeKind: 'added', additions: 40, deletions: 0, isTestFile: false },
      { path: 'src/lockout.test.ts', changeKind: 'added', additions: 25, deletions: 0, isTestFile: true },
    ],
    ...overrides,
  };
}

export function makeReviewResult(overrides: Partial<ReviewResult> = {}): ReviewResult {
  return {
    status: 'conditional',
    overallScore: 0.74,
    summary: 'Review CONDITIONAL with an overall score of 74.0%.',
    components: [
      { name: 'Acceptance criteria', score: 0.16, weight: 0.4, description: '1/2 criteria fulfilled.' },
      { name: 'Code quality', score: 0.9, weight: 0.3, description: '1 quality finding.' },
    ],
    criteria: [
      {
        criterion: 'Lock after 5 attempts',
        fulfilled: true,
        confidence: 0.9,
        evidence: ['counter added'],
        gaps: [],
        reasoning: 'Counter compared against the limit',
      },
      {
        criterion: 'Show remaining attempts',
        fulfilled: false,
        confidence: 0,
        evidence: [],
        gaps: ['Analysis failed: rate limited'],
        reasoning: '',
      },
    ],
    findings: [
      { path: 'src/lockout.ts', kind: 'long-line', message: 'Line exceeds 120 characters (131 chars)', line: 3 },
    ],
    coverage: {
      hasTests: true,
      testFileCount: 1,
      codeFileCount: 2,
      testToCodeRatio: 0.5,
      testFiles: ['src/lockout.test.ts'],
      recommendation: 'Moderate test coverage. Good, but could be improved.',
    },
    generalAssessment: {
      securityIssues: ['Attempt counter logged with the user name'],
      performanceConcerns: [],
      maintainabilityIssues: [],
      positiveAspects: ['Small focused change'],
      overallAssessment: 'Mostly fine',
    },
    suggestions: ['Analysis failed: rate limited'],
    requiredChanges: [],
    recommendedTests: ['Test case for: Show remaining attempts'],
    ...overrides,
  };
}
