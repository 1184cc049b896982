import { describe, it, expect, vi } from 'vitest';

vi.mock('chalk', () => ({
  default: {
    green: (s: string) => s,
    yellow: (s: string) => s,
    red: (s: string) => s,
    bold: (s: string) => s,
    gray: (s: string) => s,
    cyan: (s: string) => s,
  },
}));

import { formatConsole, scoreBar } from '../../src/formatting/console-reporter.js';
import { makeReviewResult } from '../helpers/fixtures.js';

const RULE = '─'.repeat(60);

describe('scoreBar', () => {
  it('fills in proportion to the score', () => {
    expect(scoreBar(0)).toBe('░'.repeat(20));
    expect(scoreBar(1)).toBe('█'.repeat(20));
    expect(scoreBar(0.16)).toBe('███' + '░'.repeat(17));
  });

  it('clamps out-of-range scores', () => {
    expect(scoreBar(1.4)).toBe('█'.repeat(20));
    expect(scoreBar(-0.2)).toBe('░'.repeat(20));
  });
});

describe('formatConsole', () => {
  const metadata = {
    ticketKey: 'AUTH-12',
    ticketSummary: 'Throttle logins',
    prNumber: 42,
    prTitle: 'Add login throttling',
    author: 'dev',
    reviewedAt: '2026-01-15T10:00:00.000Z',
  };

  it('renders the header and status', () => {
    const lines = formatConsole(makeReviewResult(), metadata).split('\n');

    expect(lines.slice(0, 7)).toEqual([
      'Code Review Results',
      RULE,
      'Ticket: AUTH-12 Throttle logins',
      'Change: #42 Add login throttling (dev)',
      '',
      '⚠️ Status: CONDITIONAL   Score: 74.0%',
      'Review CONDITIONAL with an overall score of 74.0%.',
    ]);
  });

  it('omits the pull request number for a local change', () => {
    const output = formatConsole(makeReviewResult(), { ...metadata, prNumber: undefined, prTitle: 'main...HEAD' });
    expect(output.split('\n')[3]).toBe('Change: main...HEAD (dev)');
  });

  it('aligns the score breakdown', () => {
    const lines = formatConsole(makeReviewResult()).split('\n');

    expect(lines).toContain(`  Acceptance criteria  ${'███' + '░'.repeat(17)}   16.0%  (weight 0.4)`);
    expect(lines).toContain(`  Code quality         ${'█'.repeat(18) + '░░'}   90.0%  (weight 0.3)`);
  });

  it('lists criteria with their gaps', () => {
    const lines = formatConsole(makeReviewResult()).split('\n');

    expect(lines).toContain('Acceptance criteria (2)');
    expect(lines).toContain('  ✔ 1. Lock after 5 attempts (90.0%)');
    expect(lines).toContain('  ✘ 2. Show remaining attempts (0.0%)');
    expect(lines).toContain('      - Analysis failed: rate limited');
  });

  it('says when there are no criteria', () => {
    const lines = formatConsole(makeReviewResult({ criteria: [] })).split('\n');
    expect(lines).toContain('Acceptance criteria (0)');
    expect(lines).toContain('  No acceptance criteria found.');
  });

  it('lists findings with their location', () => {
    const lines = formatConsole(makeReviewResult()).split('\n');

    expect(lines).toContain('Code quality findings (1)');
    expect(lines).toContain('  src/lockout.ts:3  Line exceeds 120 characters (131 chars) [long-line]');
  });

  it('reports tests and recommendation sections', () => {
    const lines = formatConsole(makeReviewResult()).split('\n');

    expect(lines).toContain('  ✔ Moderate test coverage. Good, but could be improved.');
    expect(lines).toContain('    1 test file(s), 2 code file(s)');
    expect(lines).toContain('  • Attempt counter logged with the user name');
    expect(lines).toContain('  • Test case for: Show remaining attempts');
    expect(lines).not.toContain('Required changes');
  });

  it('frames the verdict comment', () => {
    const output = formatConsole(makeReviewResult({ status: 'pass', verdictComment: 'LGTM, ship it' }));
    expect(output.endsWith(`${RULE}\nLGTM, ship it\n${RULE}`)).toBe(true);
    expect(output).toContain('✅ Status: PASS');
  });
});
