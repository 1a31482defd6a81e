import { describe, it, expect } from 'vitest';
import { AxiosError } from 'axios';
import {
  AppError,
  QuoteUnavailableError,
  RpcError,
  describeError,
  errorType,
  isTransientError,
} from '../../src/core/errors.js';
import { axiosErrorWithStatus } from '../helpers.js';

describe('isTransientError', () => {
  it('treats 5xx and 429 as transient', () => {
    expect(isTransientError(axiosErrorWithStatus(502))).toBe(true);
    expect(isTransientError(axiosErrorWithStatus(429))).toBe(true);
  });

  it('treats other 4xx as permanent', () => {
    expect(isTransientError(axiosErrorWithStatus(400))).toBe(false);
    expect(isTransientError(axiosErrorWithStatus(404))).toBe(false);
  });

  it('treats axios errors without a response as transient', () => {
    expect(isTransientError(new AxiosError('timeout of 10000ms exceeded', 'ECONNABORTED'))).toBe(true);
  });

  it('recognizes errno codes and socket hang-ups', () => {
    expect(isTransientError(Object.assign(new Error('x'), { code: 'ETIMEDOUT' }))).toBe(true);
    expect(isTransientError(new Error('socket hang up'))).toBe(true);
    expect(isTransientError(new Error('invalid API key'))).toBe(false);
  });

  it('follows the transient flag on AppError', () => {
    expect(isTransientError(new RpcError('node is behind', {}, { transient: true }))).toBe(true);
    expect(isTransientError(new QuoteUnavailableError('no route'))).toBe(false);
  });
});

describe('errorType / describeError', () => {
  it('labels HTTP failures by status', () => {
    expect(errorType(axiosErrorWithStatus(503))).toBe('HTTP_503');
    expect(describeError(axiosErrorWithStatus(400, { error: 'Could not find any route' }))).toBe(
      'HTTP 400: Could not find any route'
    );
  });

  it('labels AppErrors by code and keeps the subclass name', () => {
    const err = new QuoteUnavailableError('no route');
    expect(errorType(err)).toBe('QUOTE_UNAVAILABLE');
    expect(err.name).toBe('QuoteUnavailableError');
    expect(err).toBeInstanceOf(AppError);
  });

  it('describes non-errors with String()', () => {
    expect(describeError('plain')).toBe('plain');
  });
});
