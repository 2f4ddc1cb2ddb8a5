import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Test } from '@nestjs/testing';
import { ConfigModule } from '@nestjs/config';

import { RepositoryModule } from './repository.module';
import { DIRECTORY_REPOSITORY } from '../../domain/repositories/repository.tokens';
import type { IDirectoryRepository } from '../../domain/repositories/directory.repository.interface';
import { InMemoryDirectoryRepository } from './inmemory/inmemory-directory.repository';
import { LdapDirectoryRepository } from './ldap/ldap-directory.repository';
import { DirectoryConfigModule } from '../../modules/config/directory-config.module';
import { LoggingModule } from '../../modules/logging/logging.module';
import { DIRECTORY_CONFIG, type DirectoryConfig } from '../../modules/config/directory-config';

/**
 * RepositoryModule.register() wiring tests.
 *
 * Validates that the dynamic module provides the implementation named by
 * DIRECTORY_BACKEND, whether it comes from the process environment or `.env`.
 */
describe('RepositoryModule', () => {
  const originalEnv = process.env.DIRECTORY_BACKEND;

  const compile = () =>
    Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({ isGlobal: true, ignoreEnvFile: true }),
        DirectoryConfigModule,
        LoggingModule,
        RepositoryModule.register(),
      ],
    }).compile();

  afterEach(() => {
    if (originalEnv === undefined) {
      delete process.env.DIRECTORY_BACKEND;
    } else {
      process.env.DIRECTORY_BACKEND = originalEnv;
    }
  });

  it('should provide InMemoryDirectoryRepository when DIRECTORY_BACKEND is "inmemory"', async () => {
    process.env.DIRECTORY_BACKEND = 'inmemory';
    const module = await compile();

    expect(module.get<IDirectoryRepository>(DIRECTORY_REPOSITORY)).toBeInstanceOf(InMemoryDirectoryRepository);
    await module.close();
  });

  it('should match the backend name case-insensitively', async () => {
    process.env.DIRECTORY_BACKEND = 'INMEMORY';
    const module = await compile();

    expect(module.get<IDirectoryRepository>(DIRECTORY_REPOSITORY)).toBeInstanceOf(InMemoryDirectoryRepository);
    await module.close();
  });

  it('should default to LdapDirectoryRepository', async () => {
    delete process.env.DIRECTORY_BACKEND;
    const module = await compile();

    expect(module.get<IDirectoryRepository>(DIRECTORY_REPOSITORY)).toBeInstanceOf(LdapDirectoryRepository);
    await module.close();
  });

  it('should fall back to LDAP for unknown backends', async () => {
    process.env.DIRECTORY_BACKEND = 'postgres';
    const module = await compile();

    expect(module.get<IDirectoryRepository>(DIRECTORY_REPOSITORY)).toBeInstanceOf(LdapDirectoryRepository);
    await module.close();
  });

  it('should honour DIRECTORY_BACKEND from an env file', async () => {
    delete process.env.DIRECTORY_BACKEND;
    const dir = mkdtempSync(join(tmpdir(), 'directory-env-'));
    const envFile = join(dir, '.env');
    writeFileSync(envFile, 'DIRECTORY_BACKEND=inmemory\n');

    try {
      const module = await Test.createTestingModule({
        imports: [
          ConfigModule.forRoot({ isGlobal: true, envFilePath: envFile }),
          DirectoryConfigModule,
          LoggingModule,
          RepositoryModule.register(),
        ],
      }).compile();

      expect(module.get<DirectoryConfig>(DIRECTORY_CONFIG).backend).toBe('inmemory');
      expect(module.get<IDirectoryRepository>(DIRECTORY_REPOSITORY)).toBeInstanceOf(InMemoryDirectoryRepository);
      await module.close();
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
