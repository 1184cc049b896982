import { DiffSummary, TicketInfo } from '../types.js';
import { summarizeDiff } from '../diff/diff-stats.js';

/** Context budgets, in characters unless noted. */
export const PROMPT_LIMITS = {
  description: 500,
  problemStatement: 300,
  /** Number of files whose patches are quoted. */
  files: 10,
  patch: 1000,
} as const;

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

function formatPatchExcerpts(diff: DiffSummary): string {
  return diff.files
    .slice(0, PROMPT_LIMITS.files)
    .filter((file) => file.patch)
    .map((file) => `File: ${file.path}\n${truncate(file.patch ?? '', PROMPT_LIMITS.patch)}`)
    .join('\n\n');
}

export function buildCriterionPrompt(criterion: string, diff: DiffSummary): string {
  const totals = summarizeDiff(diff);

  return [
    'You are a senior code reviewer analyzing a code change against a specific acceptance criterion.',
    '',
    '**Acceptance Criterion to Evaluate:**',
    criterion,
    '',
    '**Change Information:**',
    `- Title: ${diff.title}`,
    `- Description: ${truncate(diff.description, PROMPT_LIMITS.description)}`,
    `- Files Changed: ${totals.filesChanged}`,
    `- Additions: +${totals.additions}, Deletions: -${totals.deletions}`,
    '',
    '**Code Changes (relevant excerpts):**',
    formatPatchExcerpts(diff),
    '',
    '**Instructions:**',
    'Analyze whether this change fulfills the acceptance criterion above.',
    '',
    'Respond with a single JSON object and nothing else:',
    '{',
    '  "fulfilled": true or false,',
    '  "confidence": number between 0.0 and 1.0,',
    '  "evidence": ["specific evidence from the code that supports fulfillment"],',
    '  "gaps": ["specific missing elements or concerns"],',
    '  "reasoning": "explanation of your analysis"',
    '}',
    '',
    'Be specific and reference actual code changes where possible.',
  ].join('\n');
}

export function buildGeneralAssessmentPrompt(ticket: TicketInfo, diff: DiffSummary): string {
  const files = diff.files.slice(0, PROMPT_LIMITS.files).map((f) => f.path);
  const change = diff.number !== undefined ? `#${diff.number} - ${diff.title}` : diff.title;

  return [
    'You are a senior software engineer performing a comprehensive code review.',
    '',
    '**Context:**',
    `- Ticket: ${ticket.key} - ${ticket.summary}`,
    `- Problem: ${truncate(ticket.problemDescription, PROMPT_LIMITS.problemStatement)}`,
    `- Change: ${change}`,
    '',
    '**Key Areas to Review:**',
    '1. Security vulnerabilities',
    '2. Performance implications',
    '3. Code maintainability and readability',
    '4. Error handling',
    '5. Edge cases',
    '6. Architecture decisions',
    '',
    `**Files Changed:** ${files.join(', ')}`,
    '',
    '**Code Changes (relevant excerpts):**',
    formatPatchExcerpts(diff),
    '',
    'Respond with a single JSON object and nothing else:',
    '{',
    '  "security_issues": ["security concerns"],',
    '  "performance_concerns": ["performance issues"],',
    '  "maintainability_issues": ["maintainability problems"],',
    '  "positive_aspects": ["good practices found"],',
    '  "overall_assessment": "summary assessment"',
    '}',
    '',
    'Focus on actionable feedback and specific improvements.',
  ].join('\n');
}
