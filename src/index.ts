// src/index.ts

export { WooCommerceClient, shopBaseUrl, DEFAULT_API_VERSION } from './client';
export type { ClientConfig, ClientOverrides } from './client';
export { validateConfig, validateConfigSafe } from './config/ConfigValidator';
export type { ConfigValidationResult } from './config/ConfigValidator';
export { parseLinkHeader } from './core/pagination/PaginationParser';
export { encodeQuery } from './core/http/QueryEncoder';
export type { ListOptions, PageDescriptor, Pagination } from './core/pagination/types';
export type {
  HttpMethod,
  HttpResponse,
  HttpConfig,
  RetryConfig,
  RateLimitConfig,
  RequestDescriptor,
} from './core/http/types';
export type { Credentials, OAuth1Options } from './core/auth/types';
export type { LoggerConfig } from './observability/Logger';
export type { MetricsConfig } from './observability/MetricsCollector';

// Resource wrappers
export { ProductResource } from './resources/products/ProductResource';
export { ProductVariationResource } from './resources/products/ProductVariationResource';
export { CustomerResource } from './resources/customers/CustomerResource';
export { ReportResource } from './resources/reports/ReportResource';
export type * from './resources/types';
export type * from './resources/products/types';
export type * from './resources/customers/types';
export type * from './resources/reports/types';

// Export error classes for error handling
export {
  SDKError,
  RequestBuildError,
  TransportError,
  TransportTimeoutError,
  DecodingError,
  ResponseError,
  RateLimitError,
  ServiceUnavailableError,
  PaginationParseError,
} from './utils/errors';
