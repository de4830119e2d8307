export interface InvalidDateFormatError {
  code: 'InvalidDateFormat';
  message: string;
  input: string;
}

export interface InvalidMonthError {
  code: 'InvalidMonth';
  message: string;
  month: string;
}

export interface MissingStableIdError {
  code: 'MissingStableId';
  message: string;
  link: string;
}

export type AuthErrorReason =
  | 'not_configured'
  | 'missing'
  | 'expired'
  | 'refresh_failed'
  | 'refresh_unavailable'
  | 'exchange_failed';

export interface AuthError {
  code: 'AuthError';
  reason: AuthErrorReason;
  message: string;
}

export type SourceErrorReason = 'not_connected' | 'session_invalid' | 'unreachable';

export interface SourceError {
  code: 'SourceError';
  reason: SourceErrorReason;
  message: string;
}

export interface RemoteError {
  code: 'RemoteQueryError' | 'RemoteWriteError';
  message: string;
  status?: number;
}

/** Another process is already running a pass for the tenant. */
export interface SyncBusyError {
  code: 'SyncInProgress';
  message: string;
}

export type NormalizeError = InvalidDateFormatError | InvalidMonthError;

export type RecordError = NormalizeError | MissingStableIdError;

export type SyncError = RecordError | AuthError | SourceError | RemoteError | SyncBusyError;

export function authError(reason: AuthErrorReason, message: string): AuthError {
  return { code: 'AuthError', reason, message };
}

export function sourceError(reason: SourceErrorReason, message: string): SourceError {
  return { code: 'SourceError', reason, message };
}

/**
 * Whether retrying the same operation later can succeed without the tenant
 * doing anything. Authorization-class failures and malformed source data are
 * not retryable, except a token refresh that failed for transient reasons.
 */
export function isRetryable(error: SyncError): boolean {
  switch (error.code) {
    case 'RemoteQueryError':
    case 'RemoteWriteError':
      return error.status === undefined || error.status === 429 || error.status >= 500;
    case 'SourceError':
      return error.reason === 'unreachable';
    case 'AuthError':
      return error.reason === 'refresh_unavailable';
    case 'SyncInProgress':
      return true;
    default:
      return false;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/** Pulls an HTTP status off gaxios/fetch style errors. */
export function errorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('code' in error && typeof error.code === 'number') return error.code;
  if ('response' in error && typeof error.response === 'object' && error.response !== null) {
    const response = error.response;
    if ('status' in response && typeof response.status === 'number') return response.status;
  }
  return undefined;
}
