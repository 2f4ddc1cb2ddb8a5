/**
 * InMemoryDirectoryRepository — IDirectoryRepository backed by an in-memory Map.
 *
 * Mirrors the LDAP backend's matching rules. Optionally seeded at startup from
 * the JSON array named by DIRECTORY_SEED_FILE. Suitable for testing and
 * lightweight deployments.
 */
import { Inject, Injectable } from '@nestjs/common';
import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

import { DIRECTORY_CONFIG, type DirectoryConfig } from '../../../modules/config/directory-config';
import type { IDirectoryRepository } from '../../../domain/repositories/directory.repository.interface';
import {
  compareDirectoryEntities,
  splitSearchTerms,
  type DirectoryEntity,
  type DirectorySearchOptions,
} from '../../../domain/models/directory-entity.model';

function matchesTerm(entity: DirectoryEntity, term: string): boolean {
  return [entity.fullName, entity.username, entity.emailAddress, entity.officePhoneNumber].some(
    (value) => value !== null && value.toLowerCase().includes(term),
  );
}

@Injectable()
export class InMemoryDirectoryRepository implements IDirectoryRepository {
  private readonly entities: Map<number, DirectoryEntity> = new Map();

  constructor(@Inject(DIRECTORY_CONFIG) config: DirectoryConfig) {
    if (config.seedFile) {
      this.seed(loadSeedFile(config.seedFile));
    }
  }

  async lookupBySearch(query: string, options: DirectorySearchOptions = {}): Promise<DirectoryEntity[]> {
    const terms = splitSearchTerms(query).map((t) => t.toLowerCase());
    const type = options.type?.trim().toLowerCase();

    return Array.from(this.entities.values())
      .filter((e) => terms.every((term) => matchesTerm(e, term)))
      .filter((e) => !type || e.primaryAffiliation?.toLowerCase() === type)
      .sort(compareDirectoryEntities)
      .map((e) => ({ ...e }));
  }

  async lookupById(id: number): Promise<DirectoryEntity | null> {
    const entity = this.entities.get(id);
    return entity ? { ...entity } : null;
  }

  /** Add or replace entries by id. */
  seed(entities: DirectoryEntity[]): void {
    for (const entity of entities) {
      this.entities.set(entity.id, { ...entity });
    }
  }

  /** Clear all data — useful in test teardowns. */
  clear(): void {
    this.entities.clear();
  }
}

const STRING_FIELDS = [
  'firstName',
  'lastName',
  'fullName',
  'primaryAffiliation',
  'jobTitle',
  'department',
  'departmentMailingAddress',
  'homePhoneNumber',
  'homeAddress',
  'officePhoneNumber',
  'officeAddress',
  'faxNumber',
  'emailAddress',
  'username',
] as const;

function optionalString(record: Record<string, unknown>, field: string): string | null {
  const value = record[field];
  return typeof value === 'string' ? value : null;
}

/** Parse one seed record; records without an integer id are rejected. */
export function parseSeedEntity(value: unknown, position: number): DirectoryEntity {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error(`Seed entry ${position} is not an object`);
  }
  const record: Record<string, unknown> = { ...value };
  const id = record.id;
  if (typeof id !== 'number' || !Number.isSafeInteger(id)) {
    throw new Error(`Seed entry ${position} has no integer id`);
  }

  const entity: DirectoryEntity = {
    id,
    firstName: null,
    lastName: null,
    fullName: null,
    primaryAffiliation: null,
    jobTitle: null,
    department: null,
    departmentMailingAddress: null,
    homePhoneNumber: null,
    homeAddress: null,
    officePhoneNumber: null,
    officeAddress: null,
    faxNumber: null,
    emailAddress: null,
    username: null,
  };
  for (const field of STRING_FIELDS) {
    entity[field] = optionalString(record, field);
  }
  return entity;
}

export function loadSeedFile(path: string): DirectoryEntity[] {
  const parsed: unknown = JSON.parse(readFileSync(resolve(path), 'utf-8'));
  if (!Array.isArray(parsed)) {
    throw new Error(`Directory seed file ${path} must contain a JSON array`);
  }
  return parsed.map((value: unknown, index) => parseSeedEntity(value, index));
}
