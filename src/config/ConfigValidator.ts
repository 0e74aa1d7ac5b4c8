// src/config/ConfigValidator.ts

import { z } from 'zod';

const RetryConfigSchema = z.object({
  maxRetries: z.number().int().min(0).max(10),
});

const HttpConfigSchema = z
  .object({
    timeout: z.number().int().positive().optional(),
    keepAlive: z.boolean().optional(),
    retry: RetryConfigSchema.optional(),
  })
  .optional();

const OAuthConfigSchema = z
  .object({
    signatureMethod: z.enum(['HMAC-SHA1', 'HMAC-SHA256']).optional(),
    placement: z.enum(['header', 'query'], {
      errorMap: () => ({ message: "OAuth placement must be 'header' or 'query'" }),
    }).optional(),
  })
  .optional();

const RateLimitConfigSchema = z
  .object({
    concurrency: z.number().int().positive(),
    qps: z.number().positive().optional(),
  })
  .optional();

const LoggerConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    format: z.enum(['json', 'pretty']).optional(),
  })
  .optional();

const MetricsConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
  })
  .optional();

export const ClientConfigSchema = z.object({
  url: z
    .string()
    .url('Shop URL must be an absolute URL')
    .refine((url) => /^https?:\/\//i.test(url), {
      message: 'Shop URL must use http or https',
    }),
  consumerKey: z.string().min(1, 'consumerKey is required'),
  consumerSecret: z.string().min(1, 'consumerSecret is required'),
  version: z
    .string()
    .regex(/^v\d+$/, "API version must look like 'v3'")
    .optional(),
  apiPathPrefix: z.string().startsWith('/', 'apiPathPrefix must start with /').optional(),
  http: HttpConfigSchema,
  oauth: OAuthConfigSchema,
  rateLimit: RateLimitConfigSchema,
  logging: LoggerConfigSchema,
  metrics: MetricsConfigSchema,
});

export type ValidatedClientConfig = z.infer<typeof ClientConfigSchema>;

export type ConfigValidationResult =
  | { success: true; data: ValidatedClientConfig }
  | { success: false; errors: string[] };

/**
 * Validate client configuration
 *
 * @throws {z.ZodError} If configuration is invalid
 */
export function validateConfig(config: unknown): ValidatedClientConfig {
  return ClientConfigSchema.parse(config);
}

/**
 * Validate configuration and return one `path: message` line per problem
 */
export function validateConfigSafe(config: unknown): ConfigValidationResult {
  const result = ClientConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
  };
}
