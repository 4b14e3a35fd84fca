import type { ErrorBody, ErrorCode } from '@speech-gateway/types';

export type ProviderErrorKind = 'auth' | 'quota' | 'rate_limit' | 'malformed_input' | 'unavailable';

export abstract class GatewayError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly statusCode: number;

  get retryable(): boolean {
    return false;
  }

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidRequestError extends GatewayError {
  readonly code = 'invalid_request';
  readonly statusCode = 400;
}

export class UnauthorizedError extends GatewayError {
  readonly code = 'unauthorized';
  readonly statusCode = 401;
}

export class PayloadTooLargeError extends GatewayError {
  readonly code = 'payload_too_large';
  readonly statusCode = 413;
}

const PROVIDER_ERROR_CODES: Record<ProviderErrorKind, { code: ErrorCode; statusCode: number }> = {
  auth: { code: 'provider_auth', statusCode: 502 },
  quota: { code: 'provider_quota', statusCode: 502 },
  rate_limit: { code: 'provider_rate_limited', statusCode: 429 },
  malformed_input: { code: 'provider_rejected_input', statusCode: 422 },
  unavailable: { code: 'upstream_unavailable', statusCode: 503 },
};

export class ProviderError extends GatewayError {
  readonly code: ErrorCode;
  readonly statusCode: number;
  readonly kind: ProviderErrorKind;
  readonly retryAfterMs?: number;
  readonly status?: number;

  constructor(
    kind: ProviderErrorKind,
    message: string,
    options: { retryAfterMs?: number; status?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.kind = kind;
    this.code = PROVIDER_ERROR_CODES[kind].code;
    this.statusCode = PROVIDER_ERROR_CODES[kind].statusCode;
    this.retryAfterMs = options.retryAfterMs;
    this.status = options.status;
  }

  override get retryable(): boolean {
    return this.kind === 'rate_limit' || this.kind === 'unavailable';
  }
}

export class TranscodeError extends GatewayError {
  readonly code = 'transcode_failed';
  readonly statusCode = 500;

  constructor(message: string, readonly diagnostic = '', readonly exitCode: number | null = null) {
    super(diagnostic ? `${message}: ${diagnostic}` : message);
  }
}

export class TimeoutError extends GatewayError {
  readonly code = 'timeout';
  readonly statusCode = 504;

  constructor(readonly deadlineMs: number) {
    super(`Request exceeded its ${deadlineMs}ms deadline`);
  }
}

// Caller went away; expected, never reported as a failure
export class CancelledError extends GatewayError {
  readonly code = 'cancelled';
  readonly statusCode = 499;

  constructor(message = 'Request cancelled by caller') {
    super(message);
  }
}

export class InternalError extends GatewayError {
  readonly code = 'internal_error';
  readonly statusCode = 500;
}

export function toGatewayError(error: unknown): GatewayError {
  if (error instanceof GatewayError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new InternalError(message, { cause: error });
}

export function toErrorBody(error: GatewayError, jobId?: string): ErrorBody {
  return {
    error: {
      code: error.code,
      // internal details stay in the logs
      message: error instanceof InternalError ? 'Internal server error' : error.message,
      retryable: error.retryable,
      ...(jobId ? { jobId } : {}),
    },
  };
}
