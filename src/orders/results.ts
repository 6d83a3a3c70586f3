import type { OperationResult, Rejection, RejectionKind } from '../types';

export function ok<T>(value: T, message: string): OperationResult<T> {
  return { ok: true, value, message };
}

export function rejection(
  kind: RejectionKind,
  message: string,
  details?: Record<string, unknown>
): Rejection {
  return details ? { kind, message, details } : { kind, message };
}

export function fail<T>(error: Rejection): OperationResult<T> {
  return { ok: false, error };
}

export function reject<T>(
  kind: RejectionKind,
  message: string,
  details?: Record<string, unknown>
): OperationResult<T> {
  return fail(rejection(kind, message, details));
}
