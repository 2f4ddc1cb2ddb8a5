import { Controller, Get, Inject, Param, Req } from '@nestjs/common';
import type { Request } from 'express';

import { DirectoryService } from '../services/directory.service';
import { DIRECTORY_CONFIG, type DirectoryConfig } from '../../config/directory-config';
import { getFirstValue, queryParameterMapFromUrl } from '../common/array-param';
import { buildBaseUrl } from '../common/base-url.util';
import { DIRECTORY_RESOURCE_PATH } from '../common/directory-constants';
import { createDirectoryError } from '../common/directory-errors';
import type { ResourceObject, ResultObject } from '../common/directory-types';

/**
 * Directory lookup.
 * Routes: /{prefix}/directory, /{prefix}/directory/{id}
 */
@Controller(DIRECTORY_RESOURCE_PATH)
export class DirectoryController {
  constructor(
    private readonly directoryService: DirectoryService,
    @Inject(DIRECTORY_CONFIG) private readonly config: DirectoryConfig,
  ) {}

  /**
   * GET /directory?q=&type=&page[number]=&page[size]=
   *
   * Parameters are read from the raw URL; Express's parsed query would have
   * nested `page[number]` into an object.
   */
  @Get()
  async search(@Req() req: Request): Promise<ResultObject<ResourceObject[]>> {
    const queryParams = queryParameterMapFromUrl(req.originalUrl);
    return this.directoryService.searchByQuery(
      {
        q: getFirstValue(queryParams, 'q'),
        type: getFirstValue(queryParams, 'type'),
        queryParams,
      },
      buildBaseUrl(req, this.config.apiPrefix),
      DIRECTORY_RESOURCE_PATH,
    );
  }

  /**
   * GET /directory/{id}
   *
   * Ids too large to hold exactly in a number cannot name an entry.
   */
  @Get(':id(\\d+)')
  async getById(@Param('id') rawId: string): Promise<ResultObject<ResourceObject>> {
    const id = Number(rawId);
    if (!Number.isSafeInteger(id)) {
      throw createDirectoryError({ status: 404, detail: `Directory entry ${rawId} not found.` });
    }
    return this.directoryService.getById(id);
  }
}
