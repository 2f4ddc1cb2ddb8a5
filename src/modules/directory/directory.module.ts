import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';

import { RepositoryModule } from '../../infrastructure/repositories/repository.module';
import { DirectoryController } from './controllers/directory.controller';
import { DirectoryExceptionFilter } from './filters/directory-exception.filter';
import { DirectoryService } from './services/directory.service';

@Module({
  imports: [RepositoryModule.register()],
  controllers: [DirectoryController],
  providers: [
    DirectoryService,
    {
      provide: APP_FILTER,
      useClass: DirectoryExceptionFilter
    }
  ]
})
export class DirectoryModule {}
