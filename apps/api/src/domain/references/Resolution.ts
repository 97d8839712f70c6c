import { ReferenceResolutionError } from "../../shared/errors/ReferenceError";

/**
 * Outcome of resolving user-supplied reference input
 *
 * Resolution never throws; callers decide whether a failure is fatal
 * (HTTP request) or something to collect and move past (ingestion).
 */
export type Resolution<T> =
  | { ok: true; value: T }
  | { ok: false; error: ReferenceResolutionError };

export function resolved<T>(value: T): Resolution<T> {
  return { ok: true, value };
}

export function failed<T>(error: ReferenceResolutionError): Resolution<T> {
  return { ok: false, error };
}

/**
 * Unwrap a resolution, throwing the carried error on failure
 */
export function unwrap<T>(resolution: Resolution<T>): T {
  if (!resolution.ok) {
    throw resolution.error;
  }
  return resolution.value;
}
