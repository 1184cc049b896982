import chalk from 'chalk';
import { ReviewMetadata, ReviewResult, ReviewStatus, ScoreComponent, formatPercent } from '@review-gate/core';

const BAR_WIDTH = 20;
const RULE = '─'.repeat(60);

const STATUS_STYLE: Record<ReviewStatus, { icon: string; color: (text: string) => string }> = {
  pass: { icon: '✅', color: chalk.green },
  conditional: { icon: '⚠️', color: chalk.yellow },
  fail: { icon: '❌', color: chalk.red },
};

export function scoreBar(score: number): string {
  const filled = Math.round(Math.min(1, Math.max(0, score)) * BAR_WIDTH);
  return `${'█'.repeat(filled)}${'░'.repeat(BAR_WIDTH - filled)}`;
}

function scoreColor(score: number): (text: string) => string {
  if (score >= 0.8) return chalk.green;
  if (score >= 0.6) return chalk.yellow;
  return chalk.red;
}

function componentLine(component: ScoreComponent, nameWidth: number): string {
  const color = scoreColor(component.score);
  return `  ${component.name.padEnd(nameWidth)}  ${color(scoreBar(component.score))}  ${formatPercent(component.score).padStart(6)}  (weight ${component.weight})`;
}

function section(lines: string[], title: string, items: readonly string[], bullet = '•'): void {
  if (items.length === 0) return;
  lines.push('', chalk.bold(title));
  for (const item of items) lines.push(`  ${bullet} ${item}`);
}

/**
 * Render a review for the terminal. Colour is applied through chalk, which
 * drops it when the stream does not support it.
 */
export function formatConsole(result: ReviewResult, metadata?: ReviewMetadata): string {
  const lines: string[] = [];
  const style = STATUS_STYLE[result.status];

  // ── Header ──
  lines.push(chalk.bold('Code Review Results'), RULE);
  if (metadata) {
    lines.push(`Ticket: ${chalk.cyan(metadata.ticketKey)} ${metadata.ticketSummary}`);
    const change = metadata.prNumber !== undefined ? `#${metadata.prNumber} ${metadata.prTitle}` : metadata.prTitle;
    lines.push(`Change: ${change} (${metadata.author})`);
  }

  // ── Status ──
  lines.push(
    '',
    `${style.icon} ${style.color(`Status: ${result.status.toUpperCase()}`)}   Score: ${chalk.bold(formatPercent(result.overallScore))}`,
    result.summary,
  );

  // ── Breakdown ──
  if (result.components.length > 0) {
    const nameWidth = Math.max(...result.components.map((c) => c.name.length));
    lines.push('', chalk.bold('Score breakdown'));
    for (const component of result.components) lines.push(componentLine(component, nameWidth));
  }

  // ── Criteria ──
  lines.push('', chalk.bold(`Acceptance criteria (${result.criteria.length})`));
  if (result.criteria.length === 0) {
    lines.push(chalk.gray('  No acceptance criteria found.'));
  }
  result.criteria.forEach((analysis, i) => {
    const mark = analysis.fulfilled ? chalk.green('✔') : chalk.red('✘');
    lines.push(`  ${mark} ${i + 1}. ${analysis.criterion} ${chalk.gray(`(${formatPercent(analysis.confidence)})`)}`);
    for (const gap of analysis.gaps) lines.push(chalk.gray(`      - ${gap}`));
  });

  // ── Findings ──
  if (result.findings.length > 0) {
    lines.push('', chalk.bold(`Code quality findings (${result.findings.length})`));
    for (const finding of result.findings) {
      const location = finding.line !== undefined ? `${finding.path}:${finding.line}` : finding.path;
      lines.push(`  ${chalk.yellow(location)}  ${finding.message} ${chalk.gray(`[${finding.kind}]`)}`);
    }
  }

  // ── Tests ──
  lines.push('', chalk.bold('Tests'));
  lines.push(`  ${result.coverage.hasTests ? chalk.green('✔') : chalk.red('✘')} ${result.coverage.recommendation}`);
  lines.push(
    chalk.gray(`    ${result.coverage.testFileCount} test file(s), ${result.coverage.codeFileCount} code file(s)`),
  );

  // ── Recommendations ──
  section(lines, 'Security issues', result.generalAssessment.securityIssues);
  section(lines, 'Required changes', result.requiredChanges);
  section(lines, 'Suggestions', result.suggestions);
  section(lines, 'Recommended tests', result.recommendedTests);

  // ── Verdict ──
  if (result.verdictComment) {
    lines.push('', RULE, chalk.green(result.verdictComment), RULE);
  }

  return lines.join('\n');
}
