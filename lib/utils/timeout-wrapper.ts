/**
 * Timeout Wrapper Utility
 *
 * Bounds a single reasoning-service call. The underlying request is not
 * aborted; its result is ignored once the timer wins.
 */

export class TimeoutError extends Error {
  constructor(message: string, public readonly timeoutMs: number) {
    super(message);
    this.name = "TimeoutError";
  }
}

/**
 * Resolve with `promise`, or reject with `TimeoutError` after `timeoutMs`.
 *
 * @example
 * const vector = await withTimeout(provider.embed(text), config.llmTimeoutMs);
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TimeoutError(`Reasoning call exceeded ${timeoutMs}ms`, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, expired]);
  } finally {
    clearTimeout(timer);
  }
}

export function isTimeoutError(error: unknown): error is TimeoutError {
  return error instanceof TimeoutError;
}
