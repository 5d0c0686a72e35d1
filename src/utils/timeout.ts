/**
 * Promise timeout helper
 */

/**
 * Raised when a wrapped promise does not settle in time
 */
export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, context?: string) {
    super(
      context ? `Timeout after ${timeoutMs}ms: ${context}` : `Operation timed out after ${timeoutMs}ms`
    );
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Race a promise against a timer.
 *
 * A non-positive or non-finite timeout returns the promise unchanged. The
 * underlying operation is not cancelled; its eventual result is ignored.
 *
 * @throws {TimeoutError} if the promise does not settle within timeoutMs
 *
 * @example
 * ```typescript
 * const passages = await withTimeout(retriever.retrieve(question), 10_000, "semantic retrieval");
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number | undefined,
  context?: string
): Promise<T> {
  if (timeoutMs === undefined || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return promise;
  }

  let timer: ReturnType<typeof setTimeout> | undefined;

  try {
    return await Promise.race([
      promise,
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new TimeoutError(timeoutMs, context)), timeoutMs);
      }),
    ]);
  } finally {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
  }
}
