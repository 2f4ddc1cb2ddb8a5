import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Request, Response } from 'express';
import * as crypto from 'node:crypto';

import { DirectoryLogger } from '../logging/directory-logger.service';
import { LogCategory } from '../logging/log-levels';
import { createDirectoryError } from '../directory/common/directory-errors';
import { AUTH_REALM } from '../directory/common/directory-constants';

export const API_SECRET_KEY = 'DIRECTORY_API_SECRET';

/**
 * Bearer shared-secret authentication for every route.
 *
 * The secret comes from DIRECTORY_API_SECRET. Outside production a missing
 * secret is generated once per guard instance and logged as a warning; in
 * production every request is rejected until it is configured.
 */
@Injectable()
export class SharedSecretGuard implements CanActivate {
  private generatedSecret?: string;

  constructor(
    private readonly configService: ConfigService,
    private readonly logger: DirectoryLogger,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const httpContext = context.switchToHttp();
    const request = httpContext.getRequest<Request>();
    const response = httpContext.getResponse<Response>();

    const expectedSecret = this.resolveSecret();
    if (!expectedSecret) {
      this.logger.fatal(LogCategory.AUTH, `${API_SECRET_KEY} is not configured.`);
      this.reject(response, 'API secret not configured.');
    }

    const header = request.headers.authorization;
    if (!header || !header.startsWith('Bearer ')) {
      this.logger.warn(LogCategory.AUTH, 'Missing or malformed Authorization header');
      this.reject(response, 'Missing bearer token.');
    }

    if (!secretsMatch(header.slice(7), expectedSecret)) {
      this.logger.warn(LogCategory.AUTH, 'Invalid bearer token');
      this.reject(response, 'Invalid bearer token.');
    }

    this.logger.trace(LogCategory.AUTH, 'Bearer token accepted');
    return true;
  }

  private resolveSecret(): string | undefined {
    const configured = this.configService.get<string>(API_SECRET_KEY);
    if (configured) return configured;
    if (process.env.NODE_ENV === 'production') return undefined;

    if (!this.generatedSecret) {
      this.generatedSecret = crypto.randomBytes(32).toString('base64url');
      this.logger.warn(LogCategory.AUTH, `Auto-generated ephemeral ${API_SECRET_KEY} for ${process.env.NODE_ENV || 'development'}`, {
        hint: `Set ${API_SECRET_KEY} to suppress this warning`,
      });
    }
    return this.generatedSecret;
  }

  private reject(response: Response, detail: string): never {
    response.setHeader('WWW-Authenticate', `Bearer realm="${AUTH_REALM}"`);
    throw createDirectoryError({ status: 401, detail });
  }
}

function secretsMatch(presented: string, expected: string): boolean {
  const a = Buffer.from(presented);
  const b = Buffer.from(expected);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}
