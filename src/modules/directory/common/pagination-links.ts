import type { PageRequest } from './array-param';

/** JSON:API navigation links; `null` marks a link that does not apply. */
export interface LinkSet {
  self: string | null;
  first: string | null;
  last: string | null;
  prev: string | null;
  next: string | null;
}

export interface PaginationContext {
  totalHits: number;
  /** Absolute base, e.g. `https://host/api/v1/`. */
  baseUrl: string;
  /** Resource path relative to the base, e.g. `directory`. */
  path: string;
  /** Passthrough params (`q`, `type`) emitted ahead of the page params, in order. */
  extraParams: Readonly<Record<string, string | null | undefined>>;
}

export const EMPTY_LINK_SET: Readonly<LinkSet> = Object.freeze({
  self: null,
  first: null,
  last: null,
  prev: null,
  next: null,
});

type ParamValue = string | number | null | undefined;

function encodeKey(key: string): string {
  // brackets stay literal so links re-parse as page[number] / page[size]
  return encodeURIComponent(key).replace(/%5B/gi, '[').replace(/%5D/gi, ']');
}

/** Serialize params onto `baseUrl + path`, dropping empty values. */
export function buildPaginationUrl(
  baseUrl: string,
  path: string,
  params: ReadonlyArray<readonly [string, ParamValue]>,
): string {
  const query = params
    .filter(([, value]) => value !== null && value !== undefined && value !== '' && value !== 0)
    .map(([key, value]) => `${encodeKey(key)}=${encodeURIComponent(String(value))}`)
    .join('&');

  return `${baseUrl}${path}?${query}`;
}

/**
 * Computes self/first/last/prev/next for one page of a search result.
 *
 * `lastPage = ceil(totalHits / pageSize)`; `prev` exists past the first page
 * and `next` while `pageNumber * pageSize < totalHits`. No hits, no links.
 */
export function buildLinks(context: PaginationContext, page: PageRequest): LinkSet {
  const { totalHits, baseUrl, path, extraParams } = context;
  if (!totalHits) {
    return { ...EMPTY_LINK_SET };
  }

  const { pageNumber, pageSize } = page;
  const lastPage = Math.ceil(totalHits / pageSize);
  const passthrough = Object.entries(extraParams);

  const linkTo = (target: number): string =>
    buildPaginationUrl(baseUrl, path, [
      ...passthrough,
      ['page[size]', pageSize],
      ['page[number]', target],
    ]);

  return {
    self: linkTo(pageNumber),
    first: linkTo(1),
    last: linkTo(lastPage),
    prev: pageNumber > 1 ? linkTo(pageNumber - 1) : null,
    next: pageNumber * pageSize < totalHits ? linkTo(pageNumber + 1) : null,
  };
}
