import axios from 'axios';

export interface AppErrorOptions {
  /** Marks the failure as safe to retry (connection drop, timeout, overloaded upstream). */
  transient?: boolean;
  cause?: unknown;
}

export class AppError extends Error {
  readonly transient: boolean;

  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
    options: AppErrorOptions = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.transient = options.transient ?? false;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_FAILED', details);
  }
}

export class ConfigError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_INVALID', details);
  }
}

export class QuoteUnavailableError extends AppError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, 'QUOTE_UNAVAILABLE', details, { cause });
  }
}

export class TransactionBuildError extends AppError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, 'TRANSACTION_BUILD_FAILED', details, { cause });
  }
}

export class SubmissionError extends AppError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, 'SUBMISSION_FAILED', details, { cause });
  }
}

export class RpcError extends AppError {
  constructor(message: string, details?: Record<string, unknown>, options: AppErrorOptions = {}) {
    super(message, 'RPC_ERROR', details, options);
  }
}

export class WalletError extends AppError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, 'WALLET_ERROR', details, { cause });
  }
}

const TRANSIENT_ERRNO = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'ETIMEDOUT',
  'ESOCKETTIMEDOUT',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'ERR_SOCKET_CONNECTION_TIMEOUT',
]);

const errnoCode = (error: unknown): string | undefined => {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  const { code } = error;
  return typeof code === 'string' ? code : undefined;
};

export const isTransientStatus = (status: number): boolean => status === 429 || status >= 500;

/**
 * Only connection failures, timeouts, 5xx and 429 responses qualify.
 * Everything else (validation, 4xx, malformed payloads) is permanent.
 */
export const isTransientError = (error: unknown): boolean => {
  if (error instanceof AppError) return error.transient;

  if (axios.isAxiosError(error)) {
    if (error.response) return isTransientStatus(error.response.status);
    // No response at all: the request never completed.
    return true;
  }

  const code = errnoCode(error);
  if (code && TRANSIENT_ERRNO.has(code)) return true;

  if (error instanceof Error) {
    const msg = error.message.toLowerCase();
    return msg.includes('socket hang up') || msg.includes('fetch failed');
  }
  return false;
};

/** Short machine-readable label used in retry events. */
export const errorType = (error: unknown): string => {
  if (axios.isAxiosError(error)) {
    return error.response ? `HTTP_${error.response.status}` : (error.code ?? 'AxiosError');
  }
  if (error instanceof AppError) return error.code;
  const code = errnoCode(error);
  if (code) return code;
  return error instanceof Error ? error.name : typeof error;
};

export const describeError = (error: unknown): string => {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    const body: unknown = error.response?.data;
    const upstream =
      typeof body === 'object' && body !== null && 'error' in body && typeof body.error === 'string'
        ? `: ${body.error}`
        : '';
    return status ? `HTTP ${status}${upstream}` : error.message;
  }
  if (error instanceof Error) return error.message;
  return String(error);
};
