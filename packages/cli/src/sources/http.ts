import { z } from 'zod';
import { FetchError, FetchSource, errorMessage } from '@review-gate/core';

export interface RequestTarget {
  source: FetchSource;
  /** Ticket key, pull request URL or git range, for error messages. */
  identifier: string;
}

/**
 * GET a JSON resource and validate it. Transport errors, non-2xx responses
 * and unexpected shapes all surface as a FetchError for the target.
 */
export async function getJson<S extends z.ZodTypeAny>(
  url: string,
  headers: Record<string, string>,
  schema: S,
  target: RequestTarget,
): Promise<z.output<S>> {
  let res: Response;
  try {
    res = await fetch(url, { method: 'GET', headers });
  } catch (error) {
    throw new FetchError(target.source, target.identifier, errorMessage(error), { cause: error });
  }

  if (!res.ok) {
    const text = await res.text().catch(() => '');
    throw new FetchError(target.source, target.identifier, `HTTP ${res.status}${text ? ` ${text}` : ''}`);
  }

  let body: unknown;
  try {
    body = await res.json();
  } catch (error) {
    throw new FetchError(target.source, target.identifier, `invalid JSON from ${url}`, { cause: error });
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new FetchError(target.source, target.identifier, `unexpected response from ${url}`, { cause: parsed.error });
  }
  return parsed.data;
}
