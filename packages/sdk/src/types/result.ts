/**
 * Call results and exit outcomes.
 */

import type { ClientError } from "../errors/base.js";

/** Result of a single remote call. No partial results. */
export type CallResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ClientError };

/** The single value a client run produces. */
export interface ExitOutcome {
  ok: boolean;
  code: number;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

export function succeeded<T>(value: T): CallResult<T> {
  return { ok: true, value };
}

export function failed<T = never>(error: ClientError): CallResult<T> {
  return { ok: false, error };
}
