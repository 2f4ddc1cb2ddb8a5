import type { DirectoryEntity } from '../../../domain/models/directory-entity.model';
import type { QueryParameterMap } from './array-param';
import type { LinkSet } from './pagination-links';
import type { DIRECTORY_RESOURCE_TYPE } from './directory-constants';

export interface ResourceObject {
  id: number;
  type: typeof DIRECTORY_RESOURCE_TYPE;
  attributes: DirectoryEntity;
}

/** `{ links, data }` response envelope. */
export interface ResultObject<T extends ResourceObject | ResourceObject[] = ResourceObject | ResourceObject[]> {
  links: LinkSet | null;
  data: T;
}

export interface SearchRequest {
  q?: string;
  type?: string;
  /** Flat map of the raw query string, for the bracketed page params. */
  queryParams: QueryParameterMap;
}
