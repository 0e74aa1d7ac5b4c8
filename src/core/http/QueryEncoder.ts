// src/core/http/QueryEncoder.ts

import { RequestBuildError } from '../../utils/errors';

/**
 * Encode a typed option object into query parameters.
 *
 * Keys are sent as written (the API's wire names). Zero values are omitted:
 * `undefined`, `null`, `''`, `0`, `false`, empty arrays and invalid dates.
 * Arrays become comma-separated lists, which the REST API parses for every
 * list-typed argument.
 *
 * @throws {RequestBuildError} For values with no query representation
 */
export function encodeQuery(options: object): URLSearchParams {
  const params = new URLSearchParams();

  for (const entry of Object.entries(options)) {
    const key = entry[0];
    const value: unknown = entry[1];
    const encoded = Array.isArray(value) ? encodeList(key, value) : encodeField(key, value);
    if (encoded !== undefined) {
      params.append(key, encoded);
    }
  }

  return params;
}

function encodeField(key: string, value: unknown): string | undefined {
  switch (typeof value) {
    case 'undefined':
      return undefined;
    case 'string':
      return value === '' ? undefined : value;
    case 'boolean':
      return value ? 'true' : undefined;
    case 'number':
      if (!Number.isFinite(value)) {
        throw new RequestBuildError(`Query option "${key}" is not a finite number`, { key, value });
      }
      return value === 0 ? undefined : String(value);
    case 'object':
      if (value === null) return undefined;
      if (value instanceof Date) {
        return Number.isNaN(value.getTime()) ? undefined : value.toISOString();
      }
      break;
  }

  throw new RequestBuildError(`Query option "${key}" cannot be encoded`, {
    key,
    type: typeof value,
  });
}

function encodeList(key: string, values: unknown[]): string | undefined {
  if (values.length === 0) return undefined;

  const items = values.map((item, index) => {
    if (typeof item === 'string') return item;
    if (typeof item === 'number' && Number.isFinite(item)) return String(item);
    throw new RequestBuildError(`Query option "${key}[${index}]" cannot be encoded`, {
      key,
      index,
      type: typeof item,
    });
  });

  return items.join(',');
}
