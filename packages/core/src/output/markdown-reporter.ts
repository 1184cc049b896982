import { CriterionAnalysis, ReviewMetadata, ReviewResult, ReviewStatus } from '../types.js';
import { formatPercent } from './format.js';

const STATUS_ICONS: Record<ReviewStatus, string> = {
  pass: '✅',
  conditional: '⚠️',
  fail: '❌',
};

function pushList(sections: string[], heading: string, items: readonly string[]): void {
  if (items.length === 0) return;
  sections.push('');
  sections.push(`## ${heading}`);
  sections.push('');
  for (const item of items) {
    sections.push(`- ${item}`);
  }
}

function formatCriterion(index: number, analysis: CriterionAnalysis): string[] {
  const lines: string[] = [];
  const icon = analysis.fulfilled ? '✅' : '❌';
  lines.push(`### ${index}. ${icon} ${analysis.criterion} (${formatPercent(analysis.confidence)} confidence)`);

  if (analysis.evidence.length > 0) {
    lines.push('');
    lines.push('**Evidence:**');
    for (const evidence of analysis.evidence) lines.push(`- ${evidence}`);
  }
  if (analysis.gaps.length > 0) {
    lines.push('');
    lines.push('**Gaps:**');
    for (const gap of analysis.gaps) lines.push(`- ${gap}`);
  }
  if (analysis.reasoning) {
    lines.push('');
    lines.push(`**Reasoning:** ${analysis.reasoning}`);
  }
  return lines;
}

/**
 * Format a ReviewResult as a Markdown report suitable for posting as a PR
 * comment or writing to a file.
 */
export function formatMarkdown(result: ReviewResult, metadata?: ReviewMetadata): string {
  const sections: string[] = [];

  // ── Header ──────────────────────────────────────────────────────────────────
  sections.push('# Code Review Results');
  if (metadata) {
    sections.push('');
    sections.push(`**Ticket:** [${metadata.ticketKey}] ${metadata.ticketSummary}`);
    const change = metadata.prNumber !== undefined ? `#${metadata.prNumber} - ${metadata.prTitle}` : metadata.prTitle;
    sections.push(`**Change:** ${change}`);
    sections.push(`**Author:** ${metadata.author}`);
    sections.push(`**Reviewed:** ${metadata.reviewedAt}`);
  }

  // ── Status ──────────────────────────────────────────────────────────────────
  sections.push('');
  sections.push(`## ${STATUS_ICONS[result.status]} Review Status: ${result.status.toUpperCase()}`);
  sections.push('');
  sections.push(`**Overall Score:** ${formatPercent(result.overallScore)}`);
  sections.push('');
  sections.push(result.summary);

  // ── Score Breakdown ─────────────────────────────────────────────────────────
  if (result.components.length > 0) {
    sections.push('');
    sections.push('## Score Breakdown');
    sections.push('');
    sections.push('| Component | Score | Weight |');
    sections.push('|-----------|------:|-------:|');
    for (const component of result.components) {
      sections.push(`| ${component.name} | ${formatPercent(component.score)} | ${component.weight} |`);
    }
  }

  // ── Acceptance Criteria ─────────────────────────────────────────────────────
  sections.push('');
  sections.push(`## Acceptance Criteria (${result.criteria.length})`);
  sections.push('');
  if (result.criteria.length > 0) {
    result.criteria.forEach((analysis, i) => {
      if (i > 0) sections.push('');
      sections.push(...formatCriterion(i + 1, analysis));
    });
  } else {
    sections.push('No acceptance criteria found.');
  }

  // ── Code Quality ────────────────────────────────────────────────────────────
  sections.push('');
  sections.push(`## Code Quality Findings (${result.findings.length})`);
  sections.push('');
  if (result.findings.length > 0) {
    for (const finding of result.findings) {
      const location = finding.line !== undefined ? `${finding.path}:${finding.line}` : finding.path;
      sections.push(`- **${location}**: ${finding.message} (\`${finding.kind}\`)`);
    }
  } else {
    sections.push('No quality findings.');
  }

  // ── Test Analysis ───────────────────────────────────────────────────────────
  sections.push('');
  sections.push('## Test Analysis');
  sections.push('');
  sections.push(`${result.coverage.hasTests ? '✅' : '❌'} **Test Coverage:** ${result.coverage.recommendation}`);
  sections.push(`- **Test files:** ${result.coverage.testFileCount}`);
  sections.push(`- **Code files:** ${result.coverage.codeFileCount}`);
  sections.push(`- **Test-to-code ratio:** ${result.coverage.testToCodeRatio.toFixed(2)}`);
  for (const testFile of result.coverage.testFiles) {
    sections.push(`  - ${testFile}`);
  }

  // ── General Assessment ──────────────────────────────────────────────────────
  const assessment = result.generalAssessment;
  if (assessment.overallAssessment) {
    sections.push('');
    sections.push('## General Assessment');
    sections.push('');
    sections.push(assessment.overallAssessment);
  }
  pushList(sections, 'Security Issues', assessment.securityIssues);
  pushList(sections, 'Performance Concerns', assessment.performanceConcerns);
  pushList(sections, 'Maintainability Issues', assessment.maintainabilityIssues);
  pushList(sections, 'Positive Aspects', assessment.positiveAspects);

  // ── Recommendations ─────────────────────────────────────────────────────────
  pushList(sections, 'Required Changes', result.requiredChanges);
  pushList(sections, 'Suggestions for Improvement', result.suggestions);
  pushList(sections, 'Recommended Test Cases', result.recommendedTests);

  // ── Verdict ─────────────────────────────────────────────────────────────────
  if (result.verdictComment) {
    sections.push('');
    sections.push('## Final Verdict');
    sections.push('');
    sections.push(result.verdictComment);
  }

  // Final newline
  sections.push('');

  return sections.join('\n');
}
