import type { PaginationDefaults } from '../directory/common/array-param';

export const DIRECTORY_CONFIG = 'DIRECTORY_CONFIG';

export type DirectoryBackend = 'ldap' | 'inmemory';

export interface LdapConnectionConfig {
  url: string;
  baseDn: string;
  /** Service account; anonymous bind when absent. */
  bindDn?: string;
  bindPassword?: string;
  objectClass: string;
  /** Attribute holding the numeric directory id. */
  idAttribute: string;
  timeoutMs: number;
  connectTimeoutMs: number;
  /** 0 = no client-requested limit. */
  sizeLimit: number;
}

export interface DirectoryConfig {
  apiPrefix: string;
  backend: DirectoryBackend;
  pagination: PaginationDefaults;
  seedFile?: string;
  ldap: LdapConnectionConfig;
}

/** Reads a raw configuration value, typically `ConfigService.get`. */
export type ConfigReader = (key: string) => string | undefined;

/** Told about every set-but-unusable value that was replaced by its default. */
export type InvalidValueReporter = (key: string, raw: string, fallback: number) => void;

function readString(read: ConfigReader, key: string, fallback: string): string {
  const value = read(key)?.trim();
  return value ? value : fallback;
}

function readOptional(read: ConfigReader, key: string): string | undefined {
  const value = read(key)?.trim();
  return value ? value : undefined;
}

function readInteger(
  read: ConfigReader,
  key: string,
  fallback: number,
  min: number,
  report?: InvalidValueReporter,
): number {
  const raw = read(key)?.trim();
  if (!raw) return fallback;
  const value = /^\d+$/.test(raw) ? Number(raw) : NaN;
  if (Number.isSafeInteger(value) && value >= min) return value;
  report?.(key, raw, fallback);
  return fallback;
}

export function parseBackend(value: string | undefined): DirectoryBackend {
  return value?.trim().toLowerCase() === 'inmemory' ? 'inmemory' : 'ldap';
}

/**
 * Build the service configuration. Unset or malformed numbers fall back to
 * their defaults; the page size ceiling never drops below the default size.
 */
export function buildDirectoryConfig(
  read: ConfigReader = (key) => process.env[key],
  report?: InvalidValueReporter,
): DirectoryConfig {
  const int = (key: string, fallback: number, min: number): number => readInteger(read, key, fallback, min, report);

  const defaultPageNumber = int('DIRECTORY_DEFAULT_PAGE_NUMBER', 1, 1);
  const defaultPageSize = int('DIRECTORY_DEFAULT_PAGE_SIZE', 10, 1);
  const maxPageSize = Math.max(int('DIRECTORY_MAX_PAGE_SIZE', 100, 1), defaultPageSize);

  return {
    apiPrefix: readString(read, 'API_PREFIX', 'api/v1'),
    backend: parseBackend(read('DIRECTORY_BACKEND')),
    pagination: { defaultPageNumber, defaultPageSize, maxPageSize },
    seedFile: readOptional(read, 'DIRECTORY_SEED_FILE'),
    ldap: {
      url: readString(read, 'LDAP_URL', 'ldap://localhost:389'),
      baseDn: readString(read, 'LDAP_BASE_DN', 'ou=people,dc=example,dc=org'),
      bindDn: readOptional(read, 'LDAP_BIND_DN'),
      bindPassword: readOptional(read, 'LDAP_BIND_PASSWORD'),
      objectClass: readString(read, 'LDAP_OBJECT_CLASS', 'person'),
      idAttribute: readString(read, 'LDAP_ID_ATTRIBUTE', 'uidNumber'),
      timeoutMs: int('LDAP_TIMEOUT_MS', 5000, 1),
      connectTimeoutMs: int('LDAP_CONNECT_TIMEOUT_MS', 5000, 1),
      sizeLimit: int('LDAP_SIZE_LIMIT', 0, 0),
    },
  };
}
