/**
 * Bracketed query parameters: `name[subkey]=value`.
 *
 * Pagination arrives as `page[number]` / `page[size]` in a flat, multi-valued
 * query map. The map is built from the raw request URL (WHATWG decoding), not
 * from Express's `qs` result, which would already have nested the keys.
 *
 * Invalid page input is never an error: it falls back to the configured
 * defaults.
 */

/** Flat multi-valued query map, in first-occurrence key order. */
export type QueryParameterMap = ReadonlyMap<string, readonly string[]>;

export interface PageRequest {
  pageNumber: number;
  pageSize: number;
}

export interface PaginationDefaults {
  defaultPageNumber: number;
  defaultPageSize: number;
  /** Page sizes above this are clamped down to it. */
  maxPageSize: number;
}

export const DEFAULT_PAGINATION: PaginationDefaults = {
  defaultPageNumber: 1,
  defaultPageSize: 10,
  maxPageSize: 100,
};

const INTEGER_LITERAL = /^\d+$/;

export function toQueryParameterMap(searchParams: URLSearchParams): QueryParameterMap {
  const map = new Map<string, string[]>();
  for (const [key, value] of searchParams) {
    const values = map.get(key);
    if (values) {
      values.push(value);
    } else {
      map.set(key, [value]);
    }
  }
  return map;
}

/** Accepts an absolute URL or a path such as `req.originalUrl`. */
export function queryParameterMapFromUrl(url: string): QueryParameterMap {
  return toQueryParameterMap(new URL(url, 'http://localhost').searchParams);
}

/** First value of a plain (non-bracketed) key. */
export function getFirstValue(params: QueryParameterMap, key: string): string | undefined {
  return params.get(key)?.[0];
}

/**
 * Returns the first value of the first entry whose key reads `key[index]`.
 *
 * Keys are split at the first `[` and the first `]`; keys lacking either
 * bracket are ignored. When several entries match, map order decides.
 */
export function getArrayParameter(
  key: string,
  index: string,
  params: QueryParameterMap,
): string | undefined {
  for (const [rawKey, values] of params) {
    const open = rawKey.indexOf('[');
    const close = rawKey.indexOf(']');
    if (open < 0 || close < 0 || close < open) continue;

    if (rawKey.slice(0, open) === key && rawKey.slice(open + 1, close) === index) {
      return values[0];
    }
  }
  return undefined;
}

function parsePositiveInteger(raw: string | undefined): number | undefined {
  if (!raw || !INTEGER_LITERAL.test(raw)) return undefined;
  const value = Number(raw);
  return Number.isSafeInteger(value) && value >= 1 ? value : undefined;
}

export function getPageNumber(
  params: QueryParameterMap,
  defaults: PaginationDefaults = DEFAULT_PAGINATION,
): number {
  return parsePositiveInteger(getArrayParameter('page', 'number', params)) ?? defaults.defaultPageNumber;
}

export function getPageSize(
  params: QueryParameterMap,
  defaults: PaginationDefaults = DEFAULT_PAGINATION,
): number {
  const size = parsePositiveInteger(getArrayParameter('page', 'size', params)) ?? defaults.defaultPageSize;
  return Math.min(size, defaults.maxPageSize);
}

export function getPageRequest(
  params: QueryParameterMap,
  defaults: PaginationDefaults = DEFAULT_PAGINATION,
): PageRequest {
  return {
    pageNumber: getPageNumber(params, defaults),
    pageSize: getPageSize(params, defaults),
  };
}
