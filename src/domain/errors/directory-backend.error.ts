/**
 * Raised by directory repositories when the backing directory cannot answer:
 * connection refused, bind rejected, protocol or result-code failures.
 *
 * The message is surfaced verbatim to API clients as a 500 detail.
 */
export class DirectoryBackendError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DirectoryBackendError';
  }
}
