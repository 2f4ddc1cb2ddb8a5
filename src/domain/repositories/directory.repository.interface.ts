/**
 * IDirectoryRepository — lookup port for the external directory.
 *
 * Implementations:
 *   - LdapDirectoryRepository     (LDAP via ldapts)
 *   - InMemoryDirectoryRepository (testing / lightweight deployments)
 *
 * Both raise DirectoryBackendError when the directory itself fails.
 */
import type { DirectoryEntity, DirectorySearchOptions } from '../models/directory-entity.model';

export interface IDirectoryRepository {
  /**
   * Free-text search. Every whitespace-separated term must match full name,
   * username, email address or office phone number (substring, any case).
   *
   * @returns Matches ordered by `compareDirectoryEntities`; empty when none.
   */
  lookupBySearch(query: string, options?: DirectorySearchOptions): Promise<DirectoryEntity[]>;

  /** Fetch one entry by its numeric identifier. */
  lookupById(id: number): Promise<DirectoryEntity | null>;
}
