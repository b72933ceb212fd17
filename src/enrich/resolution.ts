import { AuditError } from "../errors";

/**
 * Outcome of deriving one field of an execution record. `skipped` means the
 * field does not apply (or has not been looked at yet); `failed` means it
 * applied and could not be derived.
 */
export type Resolution<T> =
  | { state: "resolved"; value: T }
  | { state: "skipped"; reason: string }
  | { state: "failed"; error: AuditError };

export function resolved<T>(value: T): Resolution<T> {
  return { state: "resolved", value };
}

export function skipped<T>(reason: string): Resolution<T> {
  return { state: "skipped", reason };
}

export function failed<T>(error: AuditError): Resolution<T> {
  return { state: "failed", error };
}

export function valueOr<T>(resolution: Resolution<T>, fallback: T): T {
  return resolution.state === "resolved" ? resolution.value : fallback;
}
