/**
 * Domain model for a directory entry (a person or organisational record).
 *
 * Every attribute except `id` is optional in the backing directory, so absent
 * values are carried as `null` rather than omitted.
 */
export interface DirectoryEntity {
  id: number;
  firstName: string | null;
  lastName: string | null;
  fullName: string | null;
  primaryAffiliation: string | null;
  jobTitle: string | null;
  department: string | null;
  departmentMailingAddress: string | null;
  homePhoneNumber: string | null;
  homeAddress: string | null;
  officePhoneNumber: string | null;
  officeAddress: string | null;
  faxNumber: string | null;
  emailAddress: string | null;
  username: string | null;
}

export interface DirectorySearchOptions {
  /** Restrict hits to this primary affiliation (case-insensitive). */
  type?: string;
}

/** Stable result order: last name, first name, then id. */
export function compareDirectoryEntities(a: DirectoryEntity, b: DirectoryEntity): number {
  const byLast = (a.lastName ?? '').localeCompare(b.lastName ?? '', undefined, { sensitivity: 'base' });
  if (byLast !== 0) return byLast;
  const byFirst = (a.firstName ?? '').localeCompare(b.firstName ?? '', undefined, { sensitivity: 'base' });
  if (byFirst !== 0) return byFirst;
  return a.id - b.id;
}

/** Whitespace-separated search terms; an all-blank query yields none. */
export function splitSearchTerms(query: string): string[] {
  return query.trim().split(/\s+/).filter((term) => term.length > 0);
}
