import { Test, TestingModule } from '@nestjs/testing';
import { HttpException } from '@nestjs/common';
import type { Request } from 'express';

import { DirectoryController } from './directory.controller';
import { DirectoryService } from '../services/directory.service';
import { DIRECTORY_CONFIG, buildDirectoryConfig } from '../../config/directory-config';

describe('DirectoryController', () => {
  let controller: DirectoryController;

  const mockDirectoryService = {
    searchByQuery: jest.fn(),
    getById: jest.fn(),
  };

  const request = (originalUrl: string): Request =>
    ({
      originalUrl,
      headers: {},
      protocol: 'http',
      get: () => 'localhost:3000',
    }) as unknown as Request;

  beforeEach(async () => {
    jest.clearAllMocks();

    const module: TestingModule = await Test.createTestingModule({
      controllers: [DirectoryController],
      providers: [
        { provide: DirectoryService, useValue: mockDirectoryService },
        {
          provide: DIRECTORY_CONFIG,
          useValue: buildDirectoryConfig((key) => (key === 'API_PREFIX' ? 'people/api' : undefined)),
        },
      ],
    }).compile();

    controller = module.get<DirectoryController>(DirectoryController);
  });

  describe('search', () => {
    it('should read q, type and bracketed page params from the raw URL', async () => {
      mockDirectoryService.searchByQuery.mockResolvedValue({ links: null, data: [] });

      const result = await controller.search(
        request('/people/api/directory?q=ann%20lee&type=staff&page%5Bnumber%5D=2&page[size]=5'),
      );

      expect(result).toEqual({ links: null, data: [] });
      const [searchRequest, baseUrl, path] = mockDirectoryService.searchByQuery.mock.calls[0];
      expect(searchRequest.q).toBe('ann lee');
      expect(searchRequest.type).toBe('staff');
      expect(searchRequest.queryParams.get('page[number]')).toEqual(['2']);
      expect(searchRequest.queryParams.get('page[size]')).toEqual(['5']);
      expect(baseUrl).toBe('http://localhost:3000/people/api/');
      expect(path).toBe('directory');
    });

    it('should use the first of repeated values', async () => {
      mockDirectoryService.searchByQuery.mockResolvedValue({ links: null, data: [] });

      await controller.search(request('/people/api/directory?q=first&q=second'));

      expect(mockDirectoryService.searchByQuery.mock.calls[0][0].q).toBe('first');
    });

    it('should pass an absent query through for the service to reject', async () => {
      mockDirectoryService.searchByQuery.mockResolvedValue({ links: null, data: [] });

      await controller.search(request('/people/api/directory'));

      expect(mockDirectoryService.searchByQuery.mock.calls[0][0].q).toBeUndefined();
    });
  });

  describe('getById', () => {
    it('should delegate to the service', async () => {
      const found = { links: null, data: { id: 42, type: 'directory', attributes: {} } };
      mockDirectoryService.getById.mockResolvedValue(found);

      expect(await controller.getById('42')).toBe(found);
      expect(mockDirectoryService.getById).toHaveBeenCalledWith(42);
    });

    it('should parse leading zeros as the same id', async () => {
      mockDirectoryService.getById.mockResolvedValue({ links: null, data: null });

      await controller.getById('0042');

      expect(mockDirectoryService.getById).toHaveBeenCalledWith(42);
    });

    it('should return 404 for ids beyond the safe integer range without a lookup', async () => {
      const error = await controller.getById('99999999999999999999').then(
        () => undefined,
        (err: unknown) => err,
      );

      expect(error).toBeInstanceOf(HttpException);
      expect(error instanceof HttpException && error.getStatus()).toBe(404);
      expect(error instanceof HttpException && error.getResponse()).toEqual({
        errors: [{ status: '404', title: 'Not Found', detail: 'Directory entry 99999999999999999999 not found.' }],
      });
      expect(mockDirectoryService.getById).not.toHaveBeenCalled();
    });
  });
});
