export type FailureKind =
  | 'NotLinked'
  | 'InvalidState'
  | 'ExchangeFailed'
  | 'AuthExpired'
  | 'UpstreamError';

export interface Failure<K extends FailureKind = FailureKind> {
  kind: K;
  message: string;
  status?: number;
}

export type Ok<T> = { ok: true; value: T };
export type Err<K extends FailureKind = FailureKind> = { ok: false; error: Failure<K> };
export type Result<T, K extends FailureKind = FailureKind> = Ok<T> | Err<K>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function fail<K extends FailureKind>(kind: K, message: string, status?: number): Err<K> {
  return { ok: false, error: status === undefined ? { kind, message } : { kind, message, status } };
}

// Kinds the user can fix by linking WHOOP again.
export function needsRelink(kind: FailureKind): boolean {
  return kind === 'NotLinked' || kind === 'AuthExpired' || kind === 'ExchangeFailed';
}
