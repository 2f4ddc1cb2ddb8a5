import type { DirectoryEntity } from '@app/domain/models/directory-entity.model';
import { parseSeedEntity } from '@app/infrastructure/repositories/inmemory/inmemory-directory.repository';

let idCounter = 1000;

export function resetFixtureCounter(): void {
  idCounter = 1000;
}

/** A directory entry with sequential id and derived name fields. */
export function person(firstName: string, lastName: string, overrides: Partial<DirectoryEntity> = {}): DirectoryEntity {
  idCounter += 1;
  const username = `${firstName[0] ?? 'x'}${lastName}`.toLowerCase();
  return {
    ...parseSeedEntity({ id: idCounter }, 0),
    firstName,
    lastName,
    fullName: `${firstName} ${lastName}`,
    username,
    emailAddress: `${username}@example.test`,
    primaryAffiliation: 'staff',
    ...overrides,
  };
}

/** `count` people sharing a last name, first names "Member 01".."Member NN". */
export function family(lastName: string, count: number, overrides: Partial<DirectoryEntity> = {}): DirectoryEntity[] {
  return Array.from({ length: count }, (_, i) => person(`Member ${String(i + 1).padStart(2, '0')}`, lastName, overrides));
}
