// src/utils/errors.ts

export class SDKError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

// Build-time errors (never reach the network)
export class RequestBuildError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'REQUEST_BUILD_ERROR', details);
  }
}

// Transport errors: no HTTP response was obtained
export class TransportError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TRANSPORT_ERROR', details);
  }
}

export class TransportTimeoutError extends TransportError {
  constructor(message: string = 'Request timeout', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'TRANSPORT_TIMEOUT';
  }
}

// Response body could not be decoded
export class DecodingError extends SDKError {
  public readonly status?: number;
  public readonly body: string;

  constructor(message: string, body: string, status?: number) {
    super(message, 'DECODING_ERROR', { status });
    this.body = body;
    this.status = status;
  }
}

export interface ResponseErrorInit {
  status: number;
  errorCode?: string;
  data?: unknown;
  fieldErrors?: string[];
}

// Any non-2xx answer from the API
export class ResponseError extends SDKError {
  public readonly status: number;
  public readonly errorCode?: string;
  public readonly data?: unknown;
  public readonly fieldErrors: string[];

  constructor(message: string, init: ResponseErrorInit) {
    super(message, 'RESPONSE_ERROR', { status: init.status, errorCode: init.errorCode });
    this.status = init.status;
    this.errorCode = init.errorCode;
    this.data = init.data;
    this.fieldErrors = init.fieldErrors ?? [];
  }
}

export class RateLimitError extends ResponseError {
  /** Seconds the server asked us to wait, as sent in Retry-After. */
  public readonly retryAfter: number;

  constructor(message: string, init: ResponseErrorInit, retryAfter: number = 0) {
    super(message, init);
    this.code = 'RATE_LIMIT_EXCEEDED';
    this.retryAfter = retryAfter;
    this.details = { ...this.details, retryAfter };
  }
}

export class ServiceUnavailableError extends ResponseError {
  constructor(message: string, init: ResponseErrorInit) {
    super(message, init);
    this.code = 'SERVICE_UNAVAILABLE';
  }
}

// Link header did not follow the `<url>; rel="name"` shape
export class PaginationParseError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PAGINATION_PARSE_ERROR', details);
  }
}
