import { ReviewMetadata, ReviewResult } from '../types.js';
import { reviewReportSchema } from '../schemas.js';

export const REPORT_VERSION = '1.0';

/**
 * Format a ReviewResult as a pretty-printed JSON document, optionally with
 * the metadata of the reviewed ticket and change.
 */
export function formatJSON(result: ReviewResult, metadata?: ReviewMetadata): string {
  return JSON.stringify(
    {
      version: REPORT_VERSION,
      ...(metadata ? { metadata } : {}),
      result,
    },
    null,
    2,
  );
}

/**
 * Read back a document written by formatJSON. Throws when the text is not
 * JSON or does not describe a review result.
 */
export function parseReviewJSON(text: string): { result: ReviewResult; metadata?: ReviewMetadata } {
  const parsed = reviewReportSchema.parse(JSON.parse(text));
  return parsed.metadata ? { result: parsed.result, metadata: parsed.metadata } : { result: parsed.result };
}
