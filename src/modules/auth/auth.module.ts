import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';

import { SharedSecretGuard } from './shared-secret.guard';

@Module({
  providers: [
    {
      provide: APP_GUARD,
      useClass: SharedSecretGuard
    }
  ]
})
export class AuthModule {}
