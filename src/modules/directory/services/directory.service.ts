import { Inject, Injectable } from '@nestjs/common';

import { DIRECTORY_REPOSITORY } from '../../../domain/repositories/repository.tokens';
import type { IDirectoryRepository } from '../../../domain/repositories/directory.repository.interface';
import type { DirectoryEntity } from '../../../domain/models/directory-entity.model';
import { DirectoryBackendError } from '../../../domain/errors/directory-backend.error';
import { DIRECTORY_CONFIG, type DirectoryConfig } from '../../config/directory-config';
import { DirectoryLogger } from '../../logging/directory-logger.service';
import { LogCategory } from '../../logging/log-levels';
import { getPageRequest } from '../common/array-param';
import { buildLinks } from '../common/pagination-links';
import { createDirectoryError } from '../common/directory-errors';
import { DIRECTORY_RESOURCE_TYPE, MISSING_QUERY_DETAIL } from '../common/directory-constants';
import type { ResourceObject, ResultObject, SearchRequest } from '../common/directory-types';

export function toResourceObject(entity: DirectoryEntity): ResourceObject {
  return { id: entity.id, type: DIRECTORY_RESOURCE_TYPE, attributes: entity };
}

@Injectable()
export class DirectoryService {
  constructor(
    @Inject(DIRECTORY_REPOSITORY)
    private readonly repository: IDirectoryRepository,
    @Inject(DIRECTORY_CONFIG)
    private readonly config: DirectoryConfig,
    private readonly logger: DirectoryLogger,
  ) {}

  /**
   * One page of search hits plus navigation links.
   *
   * `baseUrl` and `path` are joined to form every link; `type`, when given,
   * narrows hits to that primary affiliation.
   */
  async searchByQuery(request: SearchRequest, baseUrl: string, path: string): Promise<ResultObject<ResourceObject[]>> {
    const q = request.q?.trim() ? request.q : undefined;
    const type = request.type?.trim() ? request.type : undefined;

    if (q === undefined) {
      this.logger.debug(LogCategory.DIRECTORY, 'Search rejected: no query');
      throw createDirectoryError({ status: 400, detail: MISSING_QUERY_DETAIL });
    }

    const page = getPageRequest(request.queryParams, this.config.pagination);
    this.logger.debug(LogCategory.PAGINATION, 'Page request', { ...page });

    const hits = await this.lookup(() => this.repository.lookupBySearch(q, { type }));
    const totalHits = hits.length;
    const start = (page.pageNumber - 1) * page.pageSize;

    this.logger.info(LogCategory.DIRECTORY, 'Search', { q, type, totalHits, ...page });

    return {
      links: totalHits > 0 ? buildLinks({ totalHits, baseUrl, path, extraParams: { q, type } }, page) : null,
      data: hits.slice(start, start + page.pageSize).map(toResourceObject),
    };
  }

  async getById(id: number): Promise<ResultObject<ResourceObject>> {
    const entity = await this.lookup(() => this.repository.lookupById(id));

    if (!entity) {
      this.logger.debug(LogCategory.DIRECTORY, 'Entry not found', { id });
      throw createDirectoryError({ status: 404, detail: `Directory entry ${id} not found.` });
    }

    this.logger.info(LogCategory.DIRECTORY, 'Lookup by id', { id });
    return { links: null, data: toResourceObject(entity) };
  }

  /** Backend failures surface as 500 carrying the backend's own message. */
  private async lookup<T>(call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (err) {
      if (err instanceof DirectoryBackendError) {
        this.logger.error(LogCategory.DIRECTORY, 'Directory backend failure', err);
        throw createDirectoryError({ status: 500, detail: err.message });
      }
      throw err;
    }
  }
}
