export class SessionRetryExhaustedError extends Error {
  constructor(readonly attempts: number) {
    super(`Browser session still lost after ${attempts} reacquisitions`);
    this.name = 'SessionRetryExhaustedError';
  }
}

export interface SessionRetryOptions {
  /** Maximum reacquisitions; 0 retries forever. */
  limit?: number;
  onRetry?: (attempt: number) => void;
}

/**
 * Runs `lookup` until it yields something other than null. A null result
 * means the session behind the lookup is gone, so each retry is preceded by
 * exactly one `reacquire`. Empty results are results and are returned as is.
 */
export async function retryOnSessionLoss<T>(
  lookup: () => Promise<T | null>,
  reacquire: () => Promise<void>,
  options: SessionRetryOptions = {}
): Promise<T> {
  const limit = options.limit ?? 0;
  let attempts = 0;
  let result = await lookup();

  while (result === null) {
    if (limit > 0 && attempts >= limit) {
      throw new SessionRetryExhaustedError(attempts);
    }
    attempts++;
    options.onRetry?.(attempts);
    await reacquire();
    result = await lookup();
  }

  return result;
}
