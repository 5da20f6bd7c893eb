import { DataSourceError } from './errors';

/**
 * Outcome of a pipeline stage. Stages report failures through this value
 * instead of throwing; the runner decides whether a failure is fatal.
 */
export type StageResult<T, E extends DataSourceError = DataSourceError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function success<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function failure<E extends DataSourceError>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
