import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { DIRECTORY_CONFIG, buildDirectoryConfig, type DirectoryConfig } from './directory-config';
import { DirectoryLogger } from '../logging/directory-logger.service';
import { LogCategory } from '../logging/log-levels';

export function createDirectoryConfig(config: ConfigService, logger: DirectoryLogger): DirectoryConfig {
  const directoryConfig = buildDirectoryConfig(
    (key) => config.get<string>(key),
    (key, raw, fallback) =>
      logger.warn(LogCategory.CONFIG, `Ignoring invalid ${key}; using default`, { value: raw, fallback }),
  );

  logger.info(LogCategory.CONFIG, 'Directory configuration loaded', {
    apiPrefix: directoryConfig.apiPrefix,
    backend: directoryConfig.backend,
    pagination: directoryConfig.pagination,
    ldapUrl: directoryConfig.ldap.url,
    baseDn: directoryConfig.ldap.baseDn,
    seedFile: directoryConfig.seedFile,
  });
  return directoryConfig;
}

@Global()
@Module({
  providers: [
    {
      provide: DIRECTORY_CONFIG,
      inject: [ConfigService, DirectoryLogger],
      useFactory: createDirectoryConfig,
    },
  ],
  exports: [DIRECTORY_CONFIG],
})
export class DirectoryConfigModule {}
