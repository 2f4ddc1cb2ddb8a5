/**
 * LdapService unit tests. `ldapts` is mocked, so no directory server is needed.
 */
const mockClient = {
  bind: jest.fn(),
  search: jest.fn(),
  unbind: jest.fn(),
};

jest.mock('ldapts', () => ({
  Client: jest.fn().mockImplementation(() => mockClient),
}));

import { Client } from 'ldapts';

import { LdapService } from './ldap.service';
import { buildDirectoryConfig, type DirectoryConfig } from '../config/directory-config';
import { DirectoryBackendError } from '../../domain/errors/directory-backend.error';
import type { DirectoryLogger } from '../logging/directory-logger.service';

describe('LdapService', () => {
  const mockLogger = {
    trace: jest.fn(),
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };

  const configWith = (values: Record<string, string>): DirectoryConfig =>
    buildDirectoryConfig((key) => values[key]);

  const serviceWith = (config: DirectoryConfig): LdapService =>
    new LdapService(config, mockLogger as unknown as DirectoryLogger);

  beforeEach(() => {
    jest.clearAllMocks();
    mockClient.bind.mockResolvedValue(undefined);
    mockClient.unbind.mockResolvedValue(undefined);
    mockClient.search.mockResolvedValue({ searchEntries: [], searchReferences: [] });
  });

  it('should create a client with the configured url and timeouts', async () => {
    const service = serviceWith(configWith({ LDAP_URL: 'ldap://dir.example.test', LDAP_TIMEOUT_MS: '1500' }));
    await service.search('(uid=*)', ['uid']);

    expect(Client).toHaveBeenCalledWith({ url: 'ldap://dir.example.test', timeout: 1500, connectTimeout: 5000 });
  });

  it('should search the base DN with subtree scope and return entries', async () => {
    const entry = { dn: 'uid=ann,ou=people,dc=example,dc=org', uid: 'ann' };
    mockClient.search.mockResolvedValue({ searchEntries: [entry], searchReferences: [] });

    const service = serviceWith(configWith({ LDAP_SIZE_LIMIT: '50' }));
    const entries = await service.search('(uid=ann)', ['uid', 'cn']);

    expect(mockClient.search).toHaveBeenCalledWith('ou=people,dc=example,dc=org', {
      scope: 'sub',
      filter: '(uid=ann)',
      attributes: ['uid', 'cn'],
      sizeLimit: 50,
    });
    expect(entries).toEqual([entry]);
    expect(mockClient.unbind).toHaveBeenCalledTimes(1);
  });

  it('should skip bind when no service DN is configured', async () => {
    await serviceWith(configWith({})).search('(uid=*)', []);
    expect(mockClient.bind).not.toHaveBeenCalled();
  });

  it('should bind with the service account when configured', async () => {
    const service = serviceWith(
      configWith({ LDAP_BIND_DN: 'cn=svc,dc=example,dc=org', LDAP_BIND_PASSWORD: 'test-secret' }),
    );
    await service.search('(uid=*)', []);
    expect(mockClient.bind).toHaveBeenCalledWith('cn=svc,dc=example,dc=org', 'test-secret');
  });

  it('should wrap client failures in DirectoryBackendError with the original message', async () => {
    mockClient.search.mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:389'));
    const service = serviceWith(configWith({}));

    await expect(service.search('(uid=*)', [])).rejects.toThrow(DirectoryBackendError);
    await expect(service.search('(uid=*)', [])).rejects.toThrow('connect ECONNREFUSED 127.0.0.1:389');
    expect(mockClient.unbind).toHaveBeenCalledTimes(2);
  });

  it('should wrap bind rejections', async () => {
    mockClient.bind.mockRejectedValue(new Error('Invalid Credentials'));
    const service = serviceWith(configWith({ LDAP_BIND_DN: 'cn=svc', LDAP_BIND_PASSWORD: 'wrong' }));

    await expect(service.search('(uid=*)', [])).rejects.toThrow('Invalid Credentials');
    expect(mockClient.search).not.toHaveBeenCalled();
  });

  it('should keep the search result when unbind fails', async () => {
    mockClient.unbind.mockRejectedValue(new Error('socket closed'));
    const entries = await serviceWith(configWith({})).search('(uid=*)', []);

    expect(entries).toEqual([]);
    expect(mockLogger.warn).toHaveBeenCalledWith('ldap', 'Unbind failed', { reason: 'socket closed' });
  });
});
