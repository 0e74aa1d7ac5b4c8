// src/resources/types.ts

import type { HttpResponse } from '../core/http/types';
import type { Pagination } from '../core/pagination/types';
import type { Logger } from '../observability/Logger';
import type { PaginationParseError } from '../utils/errors';

/**
 * The collaborator surface resource wrappers are written against.
 */
export interface ApiTransport {
  get<T = unknown>(path: string, options?: object): Promise<T>;
  getWithHeaders<T = unknown>(path: string, options?: object): Promise<HttpResponse<T>>;
  post<T = unknown>(path: string, body: unknown): Promise<T>;
  put<T = unknown>(path: string, body: unknown): Promise<T>;
  delete<T = unknown>(path: string, options?: object): Promise<T>;
}

export interface ResourceDeps {
  client: ApiTransport;
  logger: Logger;
}

/**
 * One page of a collection. When the Link header is malformed the items are
 * still returned, `pagination` is empty and `paginationError` says why.
 */
export interface ListResult<T> {
  items: T[];
  pagination: Pagination;
  paginationError?: PaginationParseError;
}

export interface DeleteOptions {
  /** true deletes permanently; false moves to trash where supported */
  force?: boolean;
}

export interface BatchRequest<T> {
  create?: T[];
  update?: T[];
  delete?: number[];
}

export interface BatchResponse<T> {
  create?: T[];
  update?: T[];
  delete?: T[];
}

export interface MetaData {
  id?: number;
  key: string;
  value: unknown;
}

export interface Link {
  href: string;
}

export type Links = Record<string, Link[]>;
