/**
 * @module query/retrieval-join
 *
 * Fan-in for the two retrieval paths. The mandatory path's failure rejects
 * the join; the optional path's failure is returned as an outcome.
 */

import { toError } from "../utils/retry.js";

export type Settled<T> = { status: "fulfilled"; value: T } | { status: "rejected"; reason: Error };

/**
 * A promise that never rejects
 */
export function settle<T>(promise: Promise<T>): Promise<Settled<T>> {
  return promise.then(
    (value): Settled<T> => ({ status: "fulfilled", value }),
    (error: unknown): Settled<T> => ({ status: "rejected", reason: toError(error) })
  );
}

export interface JoinedRetrieval<M, O> {
  mandatory: M;
  /** null when the optional path was not started */
  optional: Settled<O> | null;
}

/**
 * Wait for both paths. Rejects with the mandatory path's error; the
 * optional path is settled first so it can never surface as an unhandled
 * rejection.
 */
export async function joinRetrievals<M, O>(
  mandatory: Promise<M>,
  optional: Promise<O> | null
): Promise<JoinedRetrieval<M, O>> {
  const optionalOutcome = optional ? settle(optional) : Promise.resolve(null);
  const value = await mandatory;
  return { mandatory: value, optional: await optionalOutcome };
}
