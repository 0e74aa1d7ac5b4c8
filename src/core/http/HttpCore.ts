// src/core/http/HttpCore.ts

import axios, { type AxiosInstance } from 'axios';
import * as http from 'http';
import * as https from 'https';
import PQueue from 'p-queue';
import type {
  BuiltRequest,
  HttpConfig,
  HttpResponse,
  RateLimitConfig,
  RawResponse,
  RequestDescriptor,
} from './types';
import type { Credentials, OAuth1Options } from '../auth/types';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { Logger } from '../../observability/Logger';
import { RequestBuilder } from './RequestBuilder';
import { RetryHandler, type Sleep } from './RetryHandler';
import { Authenticator } from '../auth/Authenticator';
import { ResponseError, SDKError, TransportError, TransportTimeoutError } from '../../utils/errors';
import { generateCorrelationId, setSpanAttribute, withHttpSpan } from '../../observability/tracing';

export const DEFAULT_TIMEOUT_MS = 30000;

export interface HttpCoreOptions {
  baseUrl: string;
  pathPrefix: string;
  credentials: Credentials;
  oauth?: OAuth1Options;
  http?: HttpConfig;
  rateLimit?: RateLimitConfig;
  /** Replaces the timer used between rate-limited attempts. */
  sleep?: Sleep;
}

/**
 * Request core: build → authenticate → send with retry → classify.
 *
 * One instance per client. The keep-alive agents are the only state shared
 * between calls; attempt counters live inside each call.
 */
export class HttpCore {
  private axiosInstance: AxiosInstance;
  private rateLimiter?: PQueue;
  private builder: RequestBuilder;
  private authenticator: Authenticator;
  private retryHandler: RetryHandler;
  private metrics: MetricsCollector;
  private logger: Logger;

  constructor(options: HttpCoreOptions, metrics: MetricsCollector, logger: Logger) {
    this.metrics = metrics;
    this.logger = logger;
    this.builder = new RequestBuilder(options.baseUrl, options.pathPrefix);
    this.authenticator = new Authenticator(options.credentials, options.oauth);
    this.retryHandler = new RetryHandler(
      Object.freeze({ maxRetries: options.http?.retry?.maxRetries ?? 0 }),
      logger,
      metrics,
      options.sleep
    );

    const keepAlive = options.http?.keepAlive ?? true;
    this.axiosInstance = axios.create({
      timeout: options.http?.timeout ?? DEFAULT_TIMEOUT_MS,
      httpAgent: new http.Agent({ keepAlive }),
      httpsAgent: new https.Agent({ keepAlive }),
      responseType: 'text',
      // Every obtained response goes to the classifier, whatever its status
      validateStatus: () => true,
    });

    if (options.rateLimit) {
      this.rateLimiter = this.createRateLimiter(options.rateLimit);
    }
  }

  async get<T = unknown>(path: string, query?: object): Promise<HttpResponse<T>> {
    return this.request<T>({ method: 'GET', path, query });
  }

  async post<T = unknown>(path: string, body: unknown): Promise<HttpResponse<T>> {
    return this.request<T>({ method: 'POST', path, body });
  }

  async put<T = unknown>(path: string, body: unknown): Promise<HttpResponse<T>> {
    return this.request<T>({ method: 'PUT', path, body });
  }

  async delete<T = unknown>(path: string, query?: object): Promise<HttpResponse<T>> {
    return this.request<T>({ method: 'DELETE', path, query });
  }

  async request<T = unknown>(descriptor: RequestDescriptor): Promise<HttpResponse<T>> {
    const requestId = generateCorrelationId();
    const { method } = descriptor;

    // Build errors surface here, before any network activity
    const built = this.builder.build(descriptor, requestId);
    const strategy = this.authenticator.select(built.url);
    const url = built.url.toString();

    this.logger.debug('HTTP request', {
      requestId,
      method,
      url,
      auth: strategy.kind,
      bodyBytes: built.body?.length ?? 0,
    });

    const execute = async (): Promise<HttpResponse<T>> => {
      return withHttpSpan(method, url, async () => {
        const startTime = Date.now();

        try {
          const outcome = await this.retryHandler.execute<T>(
            (attempt) => this.send(this.authenticator.apply(strategy, built), requestId, attempt),
            { requestId, method }
          );

          const status = outcome.response.status;
          this.metrics.incrementCounter('http_requests_total', { method, status });
          this.metrics.recordLatency('http_request_duration', Date.now() - startTime, {
            method,
            status,
          });
          setSpanAttribute('http.attempts', outcome.attempts);

          return {
            data: outcome.data,
            status,
            headers: outcome.response.headers,
            attempts: outcome.attempts,
          };
        } catch (error: unknown) {
          const status = error instanceof SDKError ? String(error.details?.status ?? 'error') : 'error';
          const kind = error instanceof Error ? error.name : 'UnknownError';
          const errorCode = error instanceof ResponseError ? error.errorCode : undefined;

          this.metrics.incrementCounter('http_requests_total', { method, status });
          this.metrics.incrementCounter('http_errors', { kind });
          this.logger.debug('HTTP call failed', { requestId, method, url, kind, status, errorCode });
          throw error;
        }
      });
    };

    return this.runThroughRateLimiter(execute);
  }

  /**
   * One attempt on the wire. Resolves with any HTTP response; rejects only
   * when none was obtained.
   */
  private async send(request: BuiltRequest, requestId: string, attempt: number): Promise<RawResponse> {
    try {
      const response = await this.axiosInstance.request<string>({
        url: request.url.toString(),
        method: request.method,
        headers: request.headers,
        data: request.body,
      });

      const raw: RawResponse = {
        status: response.status,
        statusText: response.statusText,
        headers: this.toHeaderRecord(response.headers),
        body: typeof response.data === 'string' ? response.data : '',
      };

      this.logger.debug('HTTP response', {
        requestId,
        attempt,
        status: raw.status,
        bodyBytes: raw.body.length,
      });

      return raw;
    } catch (error: unknown) {
      throw this.transformError(error, requestId, attempt);
    }
  }

  private async runThroughRateLimiter<T>(task: () => Promise<T>): Promise<T> {
    const queue = this.rateLimiter;

    if (!queue) {
      return task();
    }

    const wrappedTask = async () => {
      try {
        return await task();
      } finally {
        this.metrics.recordGauge('rate_limit_queue_size', queue.size, {});
      }
    };

    this.metrics.recordGauge('rate_limit_queue_size', queue.size + 1, {});

    return queue.add(wrappedTask, { throwOnTimeout: true });
  }

  private createRateLimiter(config: RateLimitConfig): PQueue {
    if (config.qps === undefined) {
      return new PQueue({ concurrency: config.concurrency });
    }

    // Fractional QPS: one request per stretched interval
    const intervalCap = config.qps >= 1 ? Math.floor(config.qps) : 1;
    const interval = config.qps >= 1 ? 1000 : Math.floor(1000 / config.qps);

    this.logger.debug('Rate limiter initialized', {
      qps: config.qps,
      intervalCap,
      interval,
      concurrency: config.concurrency,
    });

    return new PQueue({ concurrency: config.concurrency, intervalCap, interval });
  }

  private toHeaderRecord(headers: object): Record<string, string> {
    const record: Record<string, string> = {};
    for (const entry of Object.entries(headers)) {
      const value: unknown = entry[1];
      if (typeof value === 'string') {
        record[entry[0].toLowerCase()] = value;
      } else if (Array.isArray(value)) {
        record[entry[0].toLowerCase()] = value.join(', ');
      }
    }
    return record;
  }

  private transformError(error: unknown, requestId: string, attempt: number): TransportError {
    const code = axios.isAxiosError(error) ? error.code : undefined;
    const message = error instanceof Error ? error.message : String(error);

    this.logger.debug('HTTP transport failure', { requestId, attempt, code, error: message });

    if (code === 'ECONNABORTED' || code === 'ETIMEDOUT') {
      return new TransportTimeoutError(`Request timeout: ${message}`, { requestId, cause: error });
    }
    return new TransportError(`Network error: ${message}`, { requestId, code, cause: error });
  }
}
