// src/core/http/RetryHandler.ts

import type { RawResponse, RetryConfig } from './types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { classifyResponse } from './ResponseClassifier';
import { RateLimitError, ServiceUnavailableError } from '../../utils/errors';
import { addSpanEvent } from '../../observability/tracing';

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Attempt bookkeeping for exactly one logical call. Created inside
 * `execute`, never stored on the handler.
 */
export interface AttemptState {
  attempts: number;
  retriesRemaining: number;
}

export interface RetryOutcome<T> {
  data: T;
  response: RawResponse;
  attempts: number;
}

export interface RetryContext {
  requestId: string;
  method: string;
}

export class RetryHandler {
  constructor(
    private config: RetryConfig,
    private logger: Logger,
    private metrics?: MetricsCollector,
    private sleep: Sleep = defaultSleep
  ) {}

  /**
   * Run `send` until the response classifies as success or a terminal error.
   *
   * `send` rejecting (no HTTP response) ends the call at once. 429 and 503
   * are retried while more than one attempt of the budget is left; a 429
   * first waits the whole seconds of its Retry-After. The call always gets
   * at least one attempt.
   */
  async execute<T>(
    send: (attempt: number) => Promise<RawResponse>,
    context: RetryContext
  ): Promise<RetryOutcome<T>> {
    const state: AttemptState = { attempts: 0, retriesRemaining: this.config.maxRetries };

    for (;;) {
      state.attempts++;
      const response = await send(state.attempts);
      const classification = classifyResponse<T>(response);

      if (classification.ok) {
        return { data: classification.data, response, attempts: state.attempts };
      }

      const error = classification.error;
      error.details = { ...error.details, attempts: state.attempts };

      const retryable = error instanceof RateLimitError || error instanceof ServiceUnavailableError;
      if (error instanceof RateLimitError) {
        this.metrics?.incrementCounter('rate_limit_hits', {});
      }

      if (!retryable || state.retriesRemaining <= 1) {
        throw error;
      }

      const reason = error instanceof RateLimitError ? 'rate_limited' : 'service_unavailable';
      const delay = error instanceof RateLimitError ? Math.floor(error.retryAfter) * 1000 : 0;

      this.logger.warn('Retrying request', {
        requestId: context.requestId,
        method: context.method,
        attempt: state.attempts,
        retriesRemaining: state.retriesRemaining - 1,
        status: error.status,
        reason,
        delay,
      });
      this.metrics?.incrementCounter('http_retries', { reason });
      addSpanEvent('retry', { attempt: state.attempts, reason, delay });

      if (delay > 0) {
        await this.sleep(delay);
      }
      state.retriesRemaining--;
    }
  }
}
