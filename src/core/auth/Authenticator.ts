// src/core/auth/Authenticator.ts

import type { BuiltRequest } from '../http/types';
import type { AuthStrategy, Credentials, OAuth1Options } from './types';
import { OAuth1Signer } from './OAuth1Signer';

/**
 * Attaches credentials to outgoing requests.
 *
 * Over HTTPS the channel is confidential, so the key and secret ride along as
 * `consumer_key` / `consumer_secret` query parameters. Over plain HTTP every
 * attempt is OAuth 1.0a signed instead.
 */
export class Authenticator {
  private readonly signer: OAuth1Signer;

  constructor(
    private readonly credentials: Credentials,
    oauth: OAuth1Options = {}
  ) {
    this.signer = new OAuth1Signer(credentials, oauth);
  }

  /**
   * Pick the strategy for one call from the resolved request URL. Not cached:
   * one client may reach endpoints under either scheme.
   */
  select(url: URL): AuthStrategy {
    if (url.protocol === 'https:') {
      return { kind: 'secure-query' };
    }
    return { kind: 'signed-request', signer: this.signer };
  }

  /**
   * Apply a strategy to a request. Called once per attempt so every attempt of
   * a signed call carries a fresh nonce and timestamp.
   */
  apply(strategy: AuthStrategy, request: BuiltRequest): BuiltRequest {
    switch (strategy.kind) {
      case 'secure-query': {
        const url = new URL(request.url.toString());
        url.searchParams.set('consumer_key', this.credentials.consumerKey);
        url.searchParams.set('consumer_secret', this.credentials.consumerSecret);
        return { ...request, url };
      }
      case 'signed-request':
        return strategy.signer.sign(request);
    }
  }
}
