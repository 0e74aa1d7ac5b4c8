// src/core/http/types.ts

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * One logical call against the API, as issued by a resource wrapper.
 * `path` is relative to the API prefix (e.g. `products/12`).
 */
export interface RequestDescriptor {
  method: HttpMethod;
  path: string;
  body?: unknown;
  query?: object;
}

/**
 * Fully qualified request produced by the RequestBuilder. Authentication is
 * not applied yet; that happens per attempt.
 */
export interface BuiltRequest {
  method: HttpMethod;
  url: URL;
  headers: Record<string, string>;
  body?: string;
}

/**
 * What the wire returned, body fully buffered.
 */
export interface RawResponse {
  status: number;
  statusText: string;
  headers: Record<string, string>;
  body: string;
}

export interface HttpResponse<T = unknown> {
  data: T;
  status: number;
  headers: Record<string, string>;
  attempts: number;
}

export interface RetryConfig {
  /** Maximum attempts for one call; 0 and 1 both mean a single attempt. */
  maxRetries: number;
}

export interface RateLimitConfig {
  concurrency: number;
  qps?: number;
}

export interface HttpConfig {
  timeout?: number; // milliseconds, per attempt
  keepAlive?: boolean;
  retry?: RetryConfig;
}
