// src/core/http/ResponseClassifier.ts

import { STATUS_CODES } from 'http';
import { z } from 'zod';
import type { RawResponse } from './types';
import {
  DecodingError,
  RateLimitError,
  ResponseError,
  ServiceUnavailableError,
  type ResponseErrorInit,
} from '../../utils/errors';

// {"code": "...", "message": "...", "data": {...}}
const ErrorBodySchema = z
  .object({
    code: z.string().nullish(),
    message: z.string().nullish(),
    data: z.unknown().optional(),
  })
  .passthrough();

// data.params of rest_invalid_param errors: { field: "reason" }
const ErrorDataSchema = z.object({
  params: z.record(z.string()),
});

export type Classification<T> =
  | { ok: true; data: T }
  | { ok: false; error: DecodingError | ResponseError };

/**
 * Map a completed exchange to either the decoded success value or one error
 * kind. The body is already fully buffered in `response.body`.
 */
export function classifyResponse<T>(response: RawResponse): Classification<T> {
  const { status, body } = response;

  if (status >= 200 && status <= 299) {
    try {
      return { ok: true, data: decodeJson<T>(body === '' ? 'null' : body) };
    } catch (error: unknown) {
      return { ok: false, error: new DecodingError(errorMessage(error), body, status) };
    }
  }

  const parsed = parseErrorBody(body, status);
  if (parsed instanceof DecodingError) {
    return { ok: false, error: parsed };
  }

  const message = parsed.message ?? '';
  const init: ResponseErrorInit = {
    status,
    errorCode: parsed.code ?? undefined,
    data: parsed.data,
    fieldErrors: extractFieldErrors(parsed.data),
  };

  if (status === 429) {
    return {
      ok: false,
      error: new RateLimitError(message, init, parseRetryAfter(response.headers['retry-after'])),
    };
  }
  if (status === 503) {
    return { ok: false, error: new ServiceUnavailableError(message, init) };
  }
  if (status === 406) {
    // The API answers 406 with bodies that do not describe the problem
    return { ok: false, error: new ResponseError(STATUS_CODES[406] ?? 'Not Acceptable', init) };
  }
  return { ok: false, error: new ResponseError(message, init) };
}

/**
 * Retry-After in seconds, integer or fractional. Anything else reads as 0.
 */
export function parseRetryAfter(value: string | undefined): number {
  if (value === undefined) return 0;
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds > 0 ? seconds : 0;
}

type ErrorBody = z.infer<typeof ErrorBodySchema>;

function parseErrorBody(body: string, status: number): ErrorBody | DecodingError {
  if (body === '') {
    return {};
  }

  let json: unknown;
  try {
    json = decodeJson<unknown>(body);
  } catch (error: unknown) {
    return new DecodingError(errorMessage(error), body, status);
  }

  const result = ErrorBodySchema.safeParse(json ?? {});
  if (!result.success) {
    const issues = result.error.errors.map((err) => `${err.path.join('.') || 'body'}: ${err.message}`);
    return new DecodingError(`Unexpected error body: ${issues.join('; ')}`, body, status);
  }
  return result.data;
}

function extractFieldErrors(data: unknown): string[] {
  const result = ErrorDataSchema.safeParse(data);
  if (!result.success) return [];
  return Object.entries(result.data.params).map(([field, reason]) => `${field}: ${reason}`);
}

function decodeJson<T>(text: string): T {
  return JSON.parse(text);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
