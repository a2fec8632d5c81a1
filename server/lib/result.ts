export type ServiceErrorKind = "not_found" | "denied" | "conflict" | "rejected";

export interface ServiceError {
  kind: ServiceErrorKind;
  /** Notice shown to the user */
  message: string;
}

export type ServiceResult<T> = { ok: true; value: T } | { ok: false; error: ServiceError };

export function ok<T>(value: T): ServiceResult<T> {
  return { ok: true, value };
}

export function fail<T>(kind: ServiceErrorKind, message: string): ServiceResult<T> {
  return { ok: false, error: { kind, message } };
}
