/**
 * Error types for NSE API interactions and dataset persistence.
 * Callers decide per type whether a failure is fatal to the cycle.
 */

/** Session bootstrap failed. Non-fatal: the API may still answer. */
export class CookieError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly statusCode: number = 0
  ) {
    super(message);
    this.name = 'CookieError';
  }
}

/**
 * The insider trading API call failed or returned unusable content.
 * `body` holds the decoded response when it was not JSON.
 */
export class FetchError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly url: string,
    public readonly body?: string
  ) {
    super(message);
    this.name = 'FetchError';
  }
}

export class PersistenceError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly operation: 'read' | 'write'
  ) {
    super(message);
    this.name = 'PersistenceError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
