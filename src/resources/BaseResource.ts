// src/resources/BaseResource.ts

import type { ListResult, ResourceDeps } from './types';
import { parseLinkHeader } from '../core/pagination/PaginationParser';
import { PaginationParseError } from '../utils/errors';

export abstract class BaseResource {
  constructor(protected deps: ResourceDeps) {}

  /**
   * GET a collection and derive its pagination from the Link header.
   * A malformed header only fails the pagination step.
   */
  protected async listPage<T>(path: string, options?: object): Promise<ListResult<T>> {
    const response = await this.deps.client.getWithHeaders<T[]>(path, options);
    const items = response.data ?? [];

    try {
      return { items, pagination: parseLinkHeader(response.headers['link']) };
    } catch (error: unknown) {
      if (!(error instanceof PaginationParseError)) {
        throw error;
      }
      this.deps.logger.warn('Ignoring malformed Link header', {
        path,
        error: error.message,
        details: error.details,
      });
      return { items, pagination: {}, paginationError: error };
    }
  }

  protected async listItems<T>(path: string, options?: object): Promise<T[]> {
    const { items } = await this.listPage<T>(path, options);
    return items;
  }
}
