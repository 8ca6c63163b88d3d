/**
 * Outcome of a domain operation. Business-rule failures are values, not
 * exceptions; only storage or configuration faults throw.
 */
export type FailureKind =
  | 'validation'
  | 'conflict'
  | 'forbidden'
  | 'not_found'
  | 'integrity';

export interface Success<T> {
  success: true;
  message: string;
  data: T;
}

export interface Failure {
  success: false;
  kind: FailureKind;
  message: string;
}

export type Result<T = void> = Success<T> | Failure;

export function ok<T>(data: T, message: string): Success<T> {
  return { success: true, message, data };
}

export function fail(kind: FailureKind, message: string): Failure {
  return { success: false, kind, message };
}
