import { CriterionAnalysis, DiffSummary, ModelBackend, ReviewLogger } from '../types.js';
import { errorMessage } from '../errors.js';
import { buildCriterionPrompt } from './prompts.js';
import { parseCriterionResponse } from './response-parser.js';

export const BACKEND_FAILURE_REASONING = 'Could not analyze due to AI service error';

/**
 * Ask the backend whether one acceptance criterion is met by the diff.
 *
 * Never rejects: a backend failure yields an unfulfilled analysis with zero
 * confidence and the failure recorded as a gap, and an unreadable answer goes
 * through the heuristic decoder.
 */
export async function evaluateCriterion(
  backend: ModelBackend,
  criterion: string,
  diff: DiffSummary,
  logger?: ReviewLogger,
): Promise<CriterionAnalysis> {
  const prompt = buildCriterionPrompt(criterion, diff);

  let raw: string;
  try {
    raw = await backend.complete(prompt);
  } catch (error) {
    const message = errorMessage(error);
    logger?.warn(`AI analysis failed for criterion "${criterion}": ${message}`);
    return {
      criterion,
      fulfilled: false,
      confidence: 0,
      evidence: [],
      gaps: [`Analysis failed: ${message}`],
      reasoning: BACKEND_FAILURE_REASONING,
    };
  }

  const parsed = parseCriterionResponse(raw);
  if (parsed.stage === 'heuristic') {
    logger?.warn(`Unstructured AI response for criterion "${criterion}"; using heuristic extraction`);
  }

  return { criterion, ...parsed.value };
}

/**
 * Evaluate every criterion concurrently. The returned list has one entry per
 * criterion, in input order, whatever order the backend answers in.
 */
export function evaluateCriteria(
  backend: ModelBackend,
  criteria: string[],
  diff: DiffSummary,
  logger?: ReviewLogger,
): Promise<CriterionAnalysis[]> {
  return Promise.all(criteria.map((criterion) => evaluateCriterion(backend, criterion, diff, logger)));
}
