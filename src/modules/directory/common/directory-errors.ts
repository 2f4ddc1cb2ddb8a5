import { HttpException } from '@nestjs/common';

import { ERROR_TITLES } from './directory-constants';

export interface ErrorObject {
  /** HTTP status code, as a string. */
  status: string;
  title: string;
  detail: string;
}

export interface ErrorDocument {
  errors: ErrorObject[];
}

export function errorTitle(status: number): string {
  return ERROR_TITLES[status] ?? (status >= 500 ? 'Server Error' : 'Client Error');
}

export function buildErrorDocument(status: number, detail: string): ErrorDocument {
  return { errors: [{ status: String(status), title: errorTitle(status), detail }] };
}

export function isErrorDocument(value: unknown): value is ErrorDocument {
  return typeof value === 'object' && value !== null && 'errors' in value && Array.isArray(value.errors);
}

/**
 * Throwable carrying a ready-made error document; the exception filter
 * writes it out unchanged.
 *
 *   throw createDirectoryError({ status: 404, detail: 'Entry 42 not found.' });
 */
export function createDirectoryError(params: { status: number; detail: string }): HttpException {
  return new HttpException(buildErrorDocument(params.status, params.detail), params.status);
}
