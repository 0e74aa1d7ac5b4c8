// src/core/auth/types.ts

import type { OAuth1Signer } from './OAuth1Signer';

/**
 * Consumer key/secret pair issued by the store. Frozen for the lifetime of a
 * client.
 */
export interface Credentials {
  readonly consumerKey: string;
  readonly consumerSecret: string;
}

export interface OAuth1Options {
  signatureMethod?: 'HMAC-SHA1' | 'HMAC-SHA256';
  /** Where the oauth_* parameters travel: Authorization header or query string. */
  placement?: 'header' | 'query';
}

/**
 * How credentials are attached to one call. Chosen from the request URL's
 * scheme right before dispatch.
 */
export type AuthStrategy =
  | { kind: 'secure-query' }
  | { kind: 'signed-request'; signer: OAuth1Signer };
