// src/core/pagination/PaginationParser.ts

import type { PageDescriptor, Pagination } from './types';
import { PaginationParseError } from '../../utils/errors';

// `<https://shop.example/wp-json/wc/v3/products?page=2>; rel="next"`
const LINK_ENTRY = /^<([^>]+)>; rel="([^"]+)"$/;

// Entries are split on commas that start a new `<...>` entry, so commas
// inside a URL's query survive
const ENTRY_SEPARATOR = /,(?=\s*<)/;

const REL_SLOTS = new Map<string, keyof Pagination>([
  ['next', 'next'],
  ['prev', 'previous'],
  ['first', 'first'],
  ['last', 'last'],
]);

/**
 * Parse a `Link` response header into next/previous/first/last descriptors.
 *
 * An absent or empty header yields an empty Pagination. Every entry must be
 * `<URL>; rel="REL"`; the first one that is not fails the whole parse.
 * Unknown relations are skipped and a repeated relation overwrites the
 * earlier one.
 *
 * @throws {PaginationParseError}
 */
export function parseLinkHeader(header: string | undefined): Pagination {
  const pagination: Pagination = {};

  if (header === undefined || header.trim() === '') {
    return pagination;
  }

  for (const rawEntry of header.split(ENTRY_SEPARATOR)) {
    const entry = rawEntry.trim();
    const match = LINK_ENTRY.exec(entry);
    if (!match) {
      throw new PaginationParseError('Could not extract pagination link header', { entry });
    }

    const [, target, rel] = match;
    const descriptor = parsePageDescriptor(target);

    const slot = REL_SLOTS.get(rel);
    if (slot) {
      pagination[slot] = descriptor;
    }
  }

  return pagination;
}

function parsePageDescriptor(target: string): PageDescriptor {
  let url: URL;
  try {
    // Relative targets resolve against a placeholder; only the query matters
    url = new URL(target, 'http://pagination.invalid');
  } catch (error: unknown) {
    throw new PaginationParseError('Pagination does not contain a valid URL', {
      url: target,
      cause: error,
    });
  }

  const params = url.searchParams;
  const descriptor: PageDescriptor = { page: readInteger(params, 'page') ?? 0 };

  const perPage = readInteger(params, 'per_page');
  if (perPage !== undefined) descriptor.per_page = perPage;

  const offset = readInteger(params, 'offset');
  if (offset !== undefined) descriptor.offset = offset;

  for (const key of ['search', 'after', 'before', 'orderby'] as const) {
    const value = params.get(key);
    if (value) descriptor[key] = value;
  }

  const order = params.get('order');
  if (order === 'asc' || order === 'desc') descriptor.order = order;

  const context = params.get('context');
  if (context === 'view' || context === 'edit') descriptor.context = context;

  return descriptor;
}

function readInteger(params: URLSearchParams, key: string): number | undefined {
  const value = params.get(key);
  if (value === null || value === '') return undefined;

  if (!/^-?\d+$/.test(value)) {
    throw new PaginationParseError(`Pagination parameter "${key}" is not an integer`, {
      key,
      value,
    });
  }
  return Number.parseInt(value, 10);
}
