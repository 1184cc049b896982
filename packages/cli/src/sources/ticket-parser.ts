import { ConfigError } from '@review-gate/core';

export const NO_DESCRIPTION = 'No description provided';

/** Section headings that introduce acceptance criteria, in lookup order. */
const CRITERIA_HEADINGS = ['acceptance\\s+criteria', 'definition\\s+of\\s+done', 'success\\s+criteria', 'requirements'];

const TICKET_KEY = /\b([A-Z][A-Z0-9_]*-\d+)\b/;
const PULL_REQUEST_URL = /https:\/\/github\.com\/[\w.-]+\/[\w.-]+\/pull\/\d+/g;

const BULLET_ITEM = /^\s*[-*+•]\s+(.+)$/;
const NUMBERED_ITEM = /^\s*\d+[.)]\s+(.+)$/;
const CHECKBOX = /^\[[ xX]\]\s*/;

export interface ParsedDescription {
  problemDescription: string;
  acceptanceCriteria: string[];
}

/**
 * Accepts a bare key (`AUTH-12`) or any URL containing one, such as a
 * `/browse/AUTH-12` link.
 */
export function extractTicketKey(input: string): string {
  const match = input.match(TICKET_KEY);
  if (!match) {
    throw new ConfigError(`Could not extract a ticket key from "${input}"`, ['ticket']);
  }
  return match[1];
}

export function extractPullRequestUrls(text: string | null | undefined): string[] {
  return text ? [...text.matchAll(PULL_REQUEST_URL)].map((m) => m[0]) : [];
}

function listItem(line: string): string | undefined {
  const match = line.match(BULLET_ITEM) ?? line.match(NUMBERED_ITEM);
  if (!match) return undefined;
  const item = match[1].replace(CHECKBOX, '').trim();
  return item || undefined;
}

function headingPattern(heading: string): RegExp {
  // Optional markdown (#), Jira wiki (h3.) or bold (*) decoration around the heading.
  // The heading must end the line or be followed by a colon and inline text.
  return new RegExp(`^\\s*(?:#{1,6}\\s*|h[1-6]\\.\\s*)?\\**\\s*${heading}\\s*\\**\\s*(?::\\s*\\**\\s*(.*?))?\\s*$`, 'i');
}

/**
 * Collect the items of a criteria section: list items (or plain lines) up to
 * the first blank line or unlisted line after the list.
 */
function collectSection(lines: string[], start: number, inline: string): string[] {
  const items: string[] = inline ? [inline] : [];

  for (const line of lines.slice(start)) {
    if (!line.trim()) {
      if (items.length > 0) break;
      continue;
    }
    const item = listItem(line);
    if (item !== undefined) {
      items.push(item);
    } else if (items.length === 0) {
      items.push(line.trim());
    } else {
      break;
    }
  }

  return items;
}

function findCriteriaSection(lines: string[]): { index: number; criteria: string[] } | undefined {
  for (const heading of CRITERIA_HEADINGS) {
    const pattern = headingPattern(heading);
    const index = lines.findIndex((line) => pattern.test(line));
    if (index === -1) continue;

    const inline = lines[index].match(pattern)?.[1]?.trim() ?? '';
    const criteria = collectSection(lines, index + 1, inline);
    if (criteria.length > 0) return { index, criteria };
  }
  return undefined;
}

/**
 * Split a ticket description into the problem statement and the acceptance
 * criteria. A recognised criteria section wins and is cut from the problem
 * statement; otherwise any bullet or numbered list of at least two items is
 * taken as the criteria.
 */
export function parseTicketDescription(description: string | null | undefined): ParsedDescription {
  const text = (description ?? '').replace(/\r\n/g, '\n');
  if (!text.trim()) {
    return { problemDescription: NO_DESCRIPTION, acceptanceCriteria: [] };
  }

  const lines = text.split('\n');
  const section = findCriteriaSection(lines);
  if (section) {
    return {
      problemDescription: lines.slice(0, section.index).join('\n').trim(),
      acceptanceCriteria: section.criteria,
    };
  }

  for (const pattern of [BULLET_ITEM, NUMBERED_ITEM]) {
    const items = lines
      .map((line) => line.match(pattern)?.[1]?.replace(CHECKBOX, '').trim())
      .filter((item): item is string => Boolean(item));
    if (items.length >= 2) {
      return { problemDescription: text.trim(), acceptanceCriteria: items };
    }
  }

  return { problemDescription: text.trim(), acceptanceCriteria: [] };
}
