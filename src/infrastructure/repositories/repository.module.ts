/**
 * RepositoryModule — dynamic module that provides IDirectoryRepository.
 *
 * The backend is chosen from DIRECTORY_CONFIG.backend (DIRECTORY_BACKEND,
 * read through ConfigService so `.env` values count):
 *   - "ldap"     (default) → LdapDirectoryRepository
 *   - "inmemory"           → InMemoryDirectoryRepository
 *
 * Only the selected repository is constructed.
 *
 * Usage:
 *   imports: [RepositoryModule.register()]
 */
import { Module, type DynamicModule } from '@nestjs/common';

import { DIRECTORY_REPOSITORY } from '../../domain/repositories/repository.tokens';
import type { IDirectoryRepository } from '../../domain/repositories/directory.repository.interface';
import { DIRECTORY_CONFIG, type DirectoryConfig } from '../../modules/config/directory-config';
import { DirectoryLogger } from '../../modules/logging/directory-logger.service';
import { LdapModule } from '../../modules/ldap/ldap.module';
import { LdapService } from '../../modules/ldap/ldap.service';
import { LdapDirectoryRepository } from './ldap/ldap-directory.repository';
import { InMemoryDirectoryRepository } from './inmemory/inmemory-directory.repository';

export function createDirectoryRepository(
  config: DirectoryConfig,
  ldap: LdapService,
  logger: DirectoryLogger,
): IDirectoryRepository {
  return config.backend === 'inmemory'
    ? new InMemoryDirectoryRepository(config)
    : new LdapDirectoryRepository(ldap, config, logger);
}

@Module({})
export class RepositoryModule {
  static register(): DynamicModule {
    return {
      module: RepositoryModule,
      global: true,
      imports: [LdapModule],
      providers: [
        {
          provide: DIRECTORY_REPOSITORY,
          inject: [DIRECTORY_CONFIG, LdapService, DirectoryLogger],
          useFactory: createDirectoryRepository,
        },
      ],
      exports: [DIRECTORY_REPOSITORY],
    };
  }
}
