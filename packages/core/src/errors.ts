import type { ProviderId } from './types.js';

/**
 * Base class for every error review-gate raises on purpose. Anything else
 * reaching the CLI is a bug.
 */
export class ReviewGateError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The model backend could not produce a completion (transport, auth, timeout,
 * empty answer). The engine degrades the affected unit instead of aborting.
 */
export class BackendError extends ReviewGateError {
  readonly provider: ProviderId;

  constructor(provider: ProviderId, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.provider = provider;
  }
}

export type FetchSource = 'ticket' | 'diff';

/**
 * A ticket or diff could not be retrieved. Fatal: no partial review is
 * produced.
 */
export class FetchError extends ReviewGateError {
  readonly source: FetchSource;
  readonly identifier: string;

  constructor(source: FetchSource, identifier: string, message: string, options?: { cause?: unknown }) {
    super(`Failed to fetch ${source} ${identifier}: ${message}`, options);
    this.source = source;
    this.identifier = identifier;
  }
}

/**
 * Missing or invalid configuration, detected before any review work starts.
 */
export class ConfigError extends ReviewGateError {
  readonly settings: string[];

  constructor(message: string, settings: string[] = []) {
    super(message);
    this.settings = settings;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
