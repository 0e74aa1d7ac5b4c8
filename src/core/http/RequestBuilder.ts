// src/core/http/RequestBuilder.ts

import type { BuiltRequest, RequestDescriptor } from './types';
import { encodeQuery } from './QueryEncoder';
import { RequestBuildError } from '../../utils/errors';

export const USER_AGENT = 'woocommerce-rest-client/1.0.0';

/**
 * Turns a RequestDescriptor into a fully qualified, header-stamped request.
 * Pure: no I/O, no credentials.
 */
export class RequestBuilder {
  private readonly baseUrl: URL;
  private readonly pathPrefix: string;

  constructor(baseUrl: string, pathPrefix: string) {
    try {
      this.baseUrl = new URL(baseUrl);
    } catch (error: unknown) {
      throw new RequestBuildError('Invalid shop base URL', { baseUrl, cause: error });
    }
    const prefix = pathPrefix.replace(/^\/+|\/+$/g, '');
    this.pathPrefix = prefix ? `/${prefix}` : '';
  }

  build(descriptor: RequestDescriptor, requestId: string): BuiltRequest {
    if (descriptor.path.trim() === '') {
      throw new RequestBuildError('Request path must not be empty', {
        method: descriptor.method,
      });
    }

    const queryStart = descriptor.path.indexOf('?');
    const relPath = (queryStart === -1 ? descriptor.path : descriptor.path.slice(0, queryStart))
      .replace(/^\/+/, '');
    const pathQuery = queryStart === -1 ? '' : descriptor.path.slice(queryStart + 1);

    const basePath = this.baseUrl.pathname.replace(/\/+$/, '');
    let url: URL;
    try {
      url = new URL(`${basePath}${this.pathPrefix}/${relPath}`, this.baseUrl);
    } catch (error: unknown) {
      throw new RequestBuildError('Request URL could not be resolved', {
        path: descriptor.path,
        cause: error,
      });
    }

    // Option values first; values embedded in the path are appended after them
    const params = descriptor.query ? encodeQuery(descriptor.query) : new URLSearchParams();
    for (const [key, value] of new URLSearchParams(pathQuery)) {
      params.append(key, value);
    }
    url.search = params.toString();

    const headers: Record<string, string> = {
      Accept: 'application/json',
      'User-Agent': USER_AGENT,
      'X-Request-ID': requestId,
    };

    const built: BuiltRequest = { method: descriptor.method, url, headers };

    if (descriptor.body !== undefined) {
      built.body = this.serializeBody(descriptor.body);
      headers['Content-Type'] = 'application/json';
    }

    return built;
  }

  private serializeBody(body: unknown): string {
    let json: string | undefined;
    try {
      json = JSON.stringify(body);
    } catch (error: unknown) {
      throw new RequestBuildError('Request body could not be serialized', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
    if (json === undefined) {
      throw new RequestBuildError('Request body has no JSON representation', {
        type: typeof body,
      });
    }
    return json;
  }
}
