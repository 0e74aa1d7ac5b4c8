import crypto from 'crypto';
import type { BuiltRequest } from '../http/types';
import type { Credentials, OAuth1Options } from './types';

/**
 * One-legged OAuth 1.0a request signer.
 *
 * Used when the store is reached over plain HTTP: the consumer secret only
 * ever feeds the HMAC key and never appears in the request.
 *
 * @example
 * ```typescript
 * const signer = new OAuth1Signer(credentials, { signatureMethod: 'HMAC-SHA256' });
 * const signed = signer.sign(request);
 * ```
 */
export class OAuth1Signer {
  private readonly signatureMethod: 'HMAC-SHA1' | 'HMAC-SHA256';
  private readonly placement: 'header' | 'query';

  constructor(
    private readonly credentials: Credentials,
    options: OAuth1Options = {}
  ) {
    this.signatureMethod = options.signatureMethod ?? 'HMAC-SHA256';
    this.placement = options.placement ?? 'header';
  }

  /**
   * Sign a request. Returns a new request; the input is left untouched.
   *
   * @param nonce - Override for the generated nonce
   * @param timestamp - Override for the current Unix timestamp
   */
  sign(
    request: BuiltRequest,
    nonce: string = this.generateNonce(),
    timestamp: string = this.getTimestamp()
  ): BuiltRequest {
    const oauthParams: Record<string, string> = {
      oauth_consumer_key: this.credentials.consumerKey,
      oauth_nonce: nonce,
      oauth_signature_method: this.signatureMethod,
      oauth_timestamp: timestamp,
      oauth_version: '1.0',
    };

    const signature = this.generateSignature(request.method, request.url, oauthParams);
    const signedParams = { ...oauthParams, oauth_signature: signature };

    const url = new URL(request.url.toString());
    const headers = { ...request.headers };

    if (this.placement === 'query') {
      for (const [key, value] of Object.entries(signedParams)) {
        url.searchParams.append(key, value);
      }
    } else {
      headers['Authorization'] = this.buildAuthHeader(signedParams);
    }

    return { ...request, url, headers };
  }

  /**
   * Signature over METHOD & base URL & normalized parameters (query + oauth_*)
   */
  generateSignature(method: string, url: URL, oauthParams: Record<string, string>): string {
    // 1. Normalize parameters, sorted by encoded key then encoded value
    const pairs: Array<[string, string]> = [];
    for (const [key, value] of url.searchParams) {
      pairs.push([this.percentEncode(key), this.percentEncode(value)]);
    }
    for (const [key, value] of Object.entries(oauthParams)) {
      pairs.push([this.percentEncode(key), this.percentEncode(value)]);
    }
    pairs.sort(([ak, av], [bk, bv]) => (ak === bk ? compare(av, bv) : compare(ak, bk)));
    const paramString = pairs.map(([key, value]) => `${key}=${value}`).join('&');

    // 2. Base string
    const baseUrl = `${url.protocol}//${url.host}${url.pathname}`;
    const baseString = [
      method.toUpperCase(),
      this.percentEncode(baseUrl),
      this.percentEncode(paramString),
    ].join('&');

    // 3. Signing key (no token secret in the one-legged flow)
    const signingKey = `${this.percentEncode(this.credentials.consumerSecret)}&`;

    const algorithm = this.signatureMethod === 'HMAC-SHA256' ? 'sha256' : 'sha1';
    return crypto.createHmac(algorithm, signingKey).update(baseString).digest('base64');
  }

  private buildAuthHeader(params: Record<string, string>): string {
    const oauthParams = Object.keys(params)
      .sort()
      .map((key) => `${this.percentEncode(key)}="${this.percentEncode(params[key])}"`)
      .join(', ');

    return `OAuth ${oauthParams}`;
  }

  /**
   * Percent-encode for OAuth (RFC 3986)
   */
  private percentEncode(str: string): string {
    return encodeURIComponent(str)
      .replace(/!/g, '%21')
      .replace(/'/g, '%27')
      .replace(/\(/g, '%28')
      .replace(/\)/g, '%29')
      .replace(/\*/g, '%2A');
  }

  private generateNonce(): string {
    return crypto.randomBytes(16).toString('base64').replace(/[^a-zA-Z0-9]/g, '');
  }

  private getTimestamp(): string {
    return Math.floor(Date.now() / 1000).toString();
  }
}

function compare(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}
