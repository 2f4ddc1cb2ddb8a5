import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';

import { AppModule } from './modules/app/app.module';
import { DIRECTORY_CONFIG, type DirectoryConfig } from './modules/config/directory-config';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bufferLogs: true
  });

  // req.protocol and req.ip reflect the client behind a reverse proxy
  app.set('trust proxy', true);

  app.enableShutdownHooks();

  const config = app.get<DirectoryConfig>(DIRECTORY_CONFIG);
  app.setGlobalPrefix(config.apiPrefix);

  app.useLogger(new Logger('DirectoryApi'));

  const port = Number(process.env.PORT ?? 3000);
  await app.listen(port);
  Logger.log(`Directory API is running on http://localhost:${port}/${config.apiPrefix}/directory (backend: ${config.backend})`);
  Logger.log(`Recent logs: http://localhost:${port}/${config.apiPrefix}/admin/log-config/recent?limit=25`);
}

bootstrap().catch((err: unknown) => {
  Logger.error('Failed to start Directory API', err instanceof Error ? err.stack : String(err));
  process.exit(1);
});
