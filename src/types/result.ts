/**
 * Explicit success/failure value for steps that may come back empty-handed
 */
export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

export function success<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function failure<T>(error: string): Outcome<T> {
  return { ok: false, error };
}
