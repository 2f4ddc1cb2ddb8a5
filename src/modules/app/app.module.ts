import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { AuthModule } from '../auth/auth.module';
import { DirectoryConfigModule } from '../config/directory-config.module';
import { DirectoryModule } from '../directory/directory.module';
import { LoggingModule } from '../logging/logging.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    DirectoryConfigModule,
    LoggingModule,
    AuthModule,
    DirectoryModule
  ]
})
export class AppModule {}
