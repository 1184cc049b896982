import type { ReviewMetadata, ReviewResult } from '../../src/types.js';

export function makeReviewResult(overrides: Partial<ReviewResult> = {}): ReviewResult {
  return {
    status: 'conditional',
    overallScore: 0.74,
    summary: 'Review CONDITIONAL with an overall score of 74.0%.',
    components: [
      { name: 'Acceptance criteria', score: 0.16, weight: 0.4, description: '2/3 criteria fulfilled, mean confidence 60%.' },
      { name: 'Code quality', score: 0.9, weight: 0.3, description: '1 quality finding.', details: ['long-line: 1'] },
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

export function makeMetadata(overrides: Partial<ReviewMetadata> = {}): ReviewMetadata {
  return {
    ticketKey: 'AUTH-12',
    ticketSummary: 'Throttle logins',
    prNumber: 42,
    prTitle: 'Add login throttling',
    author: 'dev',
    reviewedAt: '2026-01-15T10:00:00.000Z',
    ...overrides,
  };
}
