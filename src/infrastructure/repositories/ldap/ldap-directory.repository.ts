/**
 * LdapDirectoryRepository — IDirectoryRepository backed by an LDAP directory.
 *
 * Filters are built with escaped values (ldap-filter.ts); entries are mapped
 * field by field (ldap-attributes.ts) and sorted before being returned, since
 * LDAP servers give no ordering guarantee.
 */
import { Inject, Injectable } from '@nestjs/common';

import { LdapService } from '../../../modules/ldap/ldap.service';
import { DIRECTORY_CONFIG, type DirectoryConfig } from '../../../modules/config/directory-config';
import { DirectoryLogger } from '../../../modules/logging/directory-logger.service';
import { LogCategory } from '../../../modules/logging/log-levels';
import type { IDirectoryRepository } from '../../../domain/repositories/directory.repository.interface';
import {
  compareDirectoryEntities,
  type DirectoryEntity,
  type DirectorySearchOptions,
} from '../../../domain/models/directory-entity.model';
import { buildIdFilter, buildSearchFilter } from './ldap-filter';
import { ldapAttributeList, toDirectoryEntity } from './ldap-attributes';

@Injectable()
export class LdapDirectoryRepository implements IDirectoryRepository {
  constructor(
    private readonly ldap: LdapService,
    @Inject(DIRECTORY_CONFIG) private readonly config: DirectoryConfig,
    private readonly logger: DirectoryLogger,
  ) {}

  async lookupBySearch(query: string, options: DirectorySearchOptions = {}): Promise<DirectoryEntity[]> {
    const { objectClass } = this.config.ldap;
    const entities = await this.searchEntities(buildSearchFilter(query, options, objectClass));
    return entities.sort(compareDirectoryEntities);
  }

  async lookupById(id: number): Promise<DirectoryEntity | null> {
    const { objectClass, idAttribute } = this.config.ldap;
    const [first] = await this.searchEntities(buildIdFilter(id, objectClass, idAttribute));
    return first ?? null;
  }

  private async searchEntities(filter: string): Promise<DirectoryEntity[]> {
    const { idAttribute } = this.config.ldap;
    const entries = await this.ldap.search(filter, ldapAttributeList(idAttribute));

    const entities: DirectoryEntity[] = [];
    for (const entry of entries) {
      const entity = toDirectoryEntity(entry, idAttribute);
      if (entity) {
        entities.push(entity);
      } else {
        this.logger.debug(LogCategory.LDAP, 'Skipping entry without a numeric id', { dn: entry.dn, idAttribute });
      }
    }
    return entities;
  }
}
