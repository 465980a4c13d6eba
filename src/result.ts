/**
 * Success/failure values returned by every I/O- or network-facing operation.
 *
 * Callers decide whether a failure skips one lecture or ends the run.
 */

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail(error: string): Result<never> {
  return { ok: false, error };
}

/** Message text for anything caught from a library call. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
