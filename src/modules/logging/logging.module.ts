import { Global, Module } from '@nestjs/common';
import { APP_INTERCEPTOR } from '@nestjs/core';

import { DirectoryLogger } from './directory-logger.service';
import { LogConfigController } from './log-config.controller';
import { RequestLoggingInterceptor } from './request-logging.interceptor';

@Global()
@Module({
  controllers: [LogConfigController],
  providers: [
    DirectoryLogger,
    {
      provide: APP_INTERCEPTOR,
      useClass: RequestLoggingInterceptor
    }
  ],
  exports: [DirectoryLogger]
})
export class LoggingModule {}
