// shared/result.ts — Lightweight Result type for outcomes the caller must branch on.
//
// Err() carries a failure the caller decides how to surface; Ok() carries the value.
// Used where a parse can fail for ordinary user input (e.g. the selection prompt)
// and throwing would force every caller into try/catch.

export type Result<T> =
  | {
      ok: true;
      data: T;
    }
  | {
      ok: false;
      error: Error;
    };
export const Ok = <T>(data: T): Result<T> => ({
  ok: true,
  data,
});
export const Err = <T>(error: Error): Result<T> => ({
  ok: false,
  error,
});
