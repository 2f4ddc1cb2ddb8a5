import { Inject, Injectable } from '@nestjs/common';
import { Client } from 'ldapts';

import { DIRECTORY_CONFIG, type DirectoryConfig } from '../config/directory-config';
import { DirectoryBackendError } from '../../domain/errors/directory-backend.error';
import { DirectoryLogger } from '../logging/directory-logger.service';
import { LogCategory } from '../logging/log-levels';

export type LdapEntry = Awaited<ReturnType<Client['search']>>['searchEntries'][number];

/**
 * Thin wrapper around an ldapts client.
 *
 * Each search opens its own connection: optional service bind, subtree search
 * under the configured base DN, unbind. Any client failure is rethrown as a
 * DirectoryBackendError carrying the client's message.
 */
@Injectable()
export class LdapService {
  constructor(
    @Inject(DIRECTORY_CONFIG) private readonly config: DirectoryConfig,
    private readonly logger: DirectoryLogger,
  ) {}

  async search(filter: string, attributes: string[]): Promise<LdapEntry[]> {
    const { url, baseDn, bindDn, bindPassword, timeoutMs, connectTimeoutMs, sizeLimit } = this.config.ldap;
    const client = new Client({ url, timeout: timeoutMs, connectTimeout: connectTimeoutMs });

    try {
      if (bindDn) {
        this.logger.debug(LogCategory.LDAP, 'Binding', { url, bindDn });
        await client.bind(bindDn, bindPassword);
      }

      this.logger.trace(LogCategory.LDAP, 'Searching', { baseDn, filter });
      const { searchEntries } = await client.search(baseDn, {
        scope: 'sub',
        filter,
        attributes,
        sizeLimit,
      });

      this.logger.debug(LogCategory.LDAP, 'Search complete', { entries: searchEntries.length });
      return searchEntries;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(LogCategory.LDAP, 'LDAP operation failed', err, { url, baseDn });
      throw new DirectoryBackendError(message, { cause: err });
    } finally {
      await this.release(client);
    }
  }

  private async release(client: Client): Promise<void> {
    try {
      await client.unbind();
    } catch (err) {
      this.logger.warn(LogCategory.LDAP, 'Unbind failed', {
        reason: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
