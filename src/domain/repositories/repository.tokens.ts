/**
 * NestJS injection tokens for repository interfaces.
 *
 * Usage:
 *   @Inject(DIRECTORY_REPOSITORY) private readonly directory: IDirectoryRepository
 */
export const DIRECTORY_REPOSITORY = 'DIRECTORY_REPOSITORY';
