// src/client.ts

import type { HttpConfig, HttpResponse, RateLimitConfig, RequestDescriptor } from './core/http/types';
import type { Credentials, OAuth1Options } from './core/auth/types';
import type { ApiTransport, ResourceDeps } from './resources/types';
import type { Sleep } from './core/http/RetryHandler';
import { HttpCore } from './core/http/HttpCore';
import { Logger, type LoggerConfig } from './observability/Logger';
import { MetricsCollector, type MetricsConfig } from './observability/MetricsCollector';
import { validateConfig } from './config/ConfigValidator';
import { ProductResource } from './resources/products/ProductResource';
import { ProductVariationResource } from './resources/products/ProductVariationResource';
import { CustomerResource } from './resources/customers/CustomerResource';
import { ReportResource } from './resources/reports/ReportResource';

export const DEFAULT_API_VERSION = 'v3';

export interface ClientConfig {
  /** Shop base URL, e.g. `https://shop.example.com` */
  url: string;
  consumerKey: string;
  consumerSecret: string;
  version?: string;
  /** Overrides the `/wp-json/wc/{version}` prefix */
  apiPathPrefix?: string;
  http?: HttpConfig;
  oauth?: OAuth1Options;
  rateLimit?: RateLimitConfig;
  logging?: LoggerConfig;
  metrics?: MetricsConfig;
}

export interface ClientOverrides {
  sleep?: Sleep;
}

/**
 * Base URL for a shop domain, always over HTTPS.
 */
export function shopBaseUrl(shopName: string): string {
  return `https://${shopName}`;
}

export class WooCommerceClient implements ApiTransport {
  readonly products: ProductResource;
  readonly productVariations: ProductVariationResource;
  readonly customers: CustomerResource;
  readonly reports: ReportResource;

  private readonly http: HttpCore;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;

  /**
   * Create a client for one shop.
   *
   * @param config - Shop URL, credentials and transport settings
   * @param overrides - Test seams
   * @throws {z.ZodError} If configuration is invalid
   *
   * @example
   * ```typescript
   * const client = new WooCommerceClient({
   *   url: 'https://shop.example.com',
   *   consumerKey: process.env.WC_CONSUMER_KEY,
   *   consumerSecret: process.env.WC_CONSUMER_SECRET,
   *   http: { retry: { maxRetries: 3 } },
   * });
   *
   * const { items, pagination } = await client.products.listWithPagination({ per_page: 50 });
   * ```
   */
  constructor(config: ClientConfig, overrides: ClientOverrides = {}) {
    const validated = validateConfig(config);

    const credentials: Credentials = Object.freeze({
      consumerKey: validated.consumerKey,
      consumerSecret: validated.consumerSecret,
    });
    const version = validated.version ?? DEFAULT_API_VERSION;
    const pathPrefix = validated.apiPathPrefix ?? `/wp-json/wc/${version}`;

    this.logger = new Logger(validated.logging);
    this.metrics = new MetricsCollector(validated.metrics);
    this.http = new HttpCore(
      {
        baseUrl: validated.url,
        pathPrefix,
        credentials,
        oauth: validated.oauth,
        http: validated.http,
        rateLimit: validated.rateLimit,
        sleep: overrides.sleep,
      },
      this.metrics,
      this.logger
    );

    const deps: ResourceDeps = { client: this, logger: this.logger };
    this.products = new ProductResource(deps);
    this.productVariations = new ProductVariationResource(deps);
    this.customers = new CustomerResource(deps);
    this.reports = new ReportResource(deps);

    this.logger.debug('Client initialized', {
      url: validated.url,
      pathPrefix,
      maxRetries: validated.http?.retry?.maxRetries ?? 0,
    });
  }

  /**
   * GET a resource and return its decoded body.
   *
   * @throws {ResponseError} For non-2xx answers (RateLimitError, ServiceUnavailableError once retries run out)
   * @throws {DecodingError} If the body is not JSON
   * @throws {TransportError} If no response was obtained
   */
  async get<T = unknown>(path: string, options?: object): Promise<T> {
    const response = await this.http.get<T>(path, options);
    return response.data;
  }

  /**
   * GET that also returns status, headers and attempt count. List endpoints
   * use it to read the Link header.
   */
  async getWithHeaders<T = unknown>(path: string, options?: object): Promise<HttpResponse<T>> {
    return this.http.get<T>(path, options);
  }

  async post<T = unknown>(path: string, body: unknown): Promise<T> {
    const response = await this.http.post<T>(path, body);
    return response.data;
  }

  async put<T = unknown>(path: string, body: unknown): Promise<T> {
    const response = await this.http.put<T>(path, body);
    return response.data;
  }

  async delete<T = unknown>(path: string, options?: object): Promise<T> {
    const response = await this.http.delete<T>(path, options);
    return response.data;
  }

  async request<T = unknown>(descriptor: RequestDescriptor): Promise<HttpResponse<T>> {
    return this.http.request<T>(descriptor);
  }

  /**
   * Prometheus text exposition of this client's metrics
   */
  async getMetrics(): Promise<string> {
    return this.metrics.getMetrics();
  }
}
