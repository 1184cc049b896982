import { DiffSummary, GeneralAssessment, ModelBackend, ReviewLogger, TicketInfo } from '../types.js';
import { errorMessage } from '../errors.js';
import { buildGeneralAssessmentPrompt } from './prompts.js';
import { parseGeneralAssessmentResponse } from './response-parser.js';

export const EMPTY_GENERAL_ASSESSMENT: GeneralAssessment = {
  securityIssues: [],
  performanceConcerns: [],
  maintainabilityIssues: [],
  positiveAspects: [],
  overallAssessment: '',
};

/**
 * Holistic review of the whole change (security, performance,
 * maintainability). Degrades to an empty assessment with a descriptive
 * summary when the backend fails.
 */
export async function assessChange(
  backend: ModelBackend,
  ticket: TicketInfo,
  diff: DiffSummary,
  logger?: ReviewLogger,
): Promise<GeneralAssessment> {
  let raw: string;
  try {
    raw = await backend.complete(buildGeneralAssessmentPrompt(ticket, diff));
  } catch (error) {
    const message = errorMessage(error);
    logger?.warn(`AI code review failed: ${message}`);
    return {
      ...EMPTY_GENERAL_ASSESSMENT,
      overallAssessment: `Review failed due to AI service error: ${message}`,
    };
  }

  const parsed = parseGeneralAssessmentResponse(raw);
  if (parsed.stage === 'heuristic') {
    logger?.warn('Unstructured AI response for the general review; keeping the raw text as the assessment');
  }
  return parsed.value;
}
