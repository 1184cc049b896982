import { ReviewStatus } from '@review-gate/core';

export const EXIT_CODES: Record<ReviewStatus, number> = {
  pass: 0,
  conditional: 1,
  fail: 2,
};

/** Configuration, fetch or unexpected errors. */
export const FATAL_EXIT_CODE = 3;
