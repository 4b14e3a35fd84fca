import { describe, it, expect } from 'vitest';
import {
  CancelledError,
  InternalError,
  InvalidRequestError,
  PayloadTooLargeError,
  ProviderError,
  TimeoutError,
  TranscodeError,
  UnauthorizedError,
  toErrorBody,
  toGatewayError,
} from '../errors';

describe('GatewayError mapping', () => {
  it.each([
    [new InvalidRequestError('bad'), 'invalid_request', 400],
    [new UnauthorizedError('no'), 'unauthorized', 401],
    [new PayloadTooLargeError('big'), 'payload_too_large', 413],
    [new ProviderError('auth', 'x'), 'provider_auth', 502],
    [new ProviderError('quota', 'x'), 'provider_quota', 502],
    [new ProviderError('rate_limit', 'x'), 'provider_rate_limited', 429],
    [new ProviderError('malformed_input', 'x'), 'provider_rejected_input', 422],
    [new ProviderError('unavailable', 'x'), 'upstream_unavailable', 503],
    [new TranscodeError('x'), 'transcode_failed', 500],
    [new TimeoutError(1000), 'timeout', 504],
    [new CancelledError(), 'cancelled', 499],
    [new InternalError('x'), 'internal_error', 500],
  ])('%s → %s / %i', (error, code, status) => {
    expect(error.code).toBe(code);
    expect(error.statusCode).toBe(status);
  });

  it('marks only rate limits and outages as retryable', () => {
    expect(new ProviderError('rate_limit', 'x').retryable).toBe(true);
    expect(new ProviderError('unavailable', 'x').retryable).toBe(true);
    expect(new ProviderError('auth', 'x').retryable).toBe(false);
    expect(new TimeoutError(5).retryable).toBe(false);
  });

  it('keeps subclass identity and name', () => {
    const error = new TimeoutError(250);
    expect(error).toBeInstanceOf(TimeoutError);
    expect(error.name).toBe('TimeoutError');
    expect(error.message).toBe('Request exceeded its 250ms deadline');
  });

  it('appends the transcoder diagnostic to the message', () => {
    const error = new TranscodeError('Transcoder exited with code 1', 'Invalid data found', 1);
    expect(error.message).toBe('Transcoder exited with code 1: Invalid data found');
    expect(error.diagnostic).toBe('Invalid data found');
    expect(error.exitCode).toBe(1);
  });
});

describe('toGatewayError', () => {
  it('passes gateway errors through', () => {
    const error = new InvalidRequestError('bad');
    expect(toGatewayError(error)).toBe(error);
  });

  it('wraps anything else as internal', () => {
    const wrapped = toGatewayError(new Error('kaput'));
    expect(wrapped).toBeInstanceOf(InternalError);
    expect(wrapped.message).toBe('kaput');
    expect(toGatewayError('text').message).toBe('text');
  });
});

describe('toErrorBody', () => {
  it('serializes code, message, retryable and job id', () => {
    expect(toErrorBody(new ProviderError('unavailable', 'down'), 'job-1')).toEqual({
      error: { code: 'upstream_unavailable', message: 'down', retryable: true, jobId: 'job-1' },
    });
  });

  it('omits the job id when absent and masks internal messages', () => {
    expect(toErrorBody(new InternalError('stack details'))).toEqual({
      error: { code: 'internal_error', message: 'Internal server error', retryable: false },
    });
  });
});
