/**
 * LDAP search filter construction (RFC 4515 string form).
 *
 * Every user-supplied value is escaped, so a `*` or `)` in a query is matched
 * literally and cannot widen the filter.
 */
import { splitSearchTerms, type DirectorySearchOptions } from '../../../domain/models/directory-entity.model';

/** Attributes a search term is matched against. */
export const SEARCHABLE_ATTRIBUTES = ['cn', 'uid', 'mail', 'telephoneNumber'] as const;

export const AFFILIATION_ATTRIBUTE = 'eduPersonPrimaryAffiliation';

const FILTER_ESCAPES: Record<string, string> = {
  '\\': '\\5c',
  '*': '\\2a',
  '(': '\\28',
  ')': '\\29',
  '\0': '\\00',
};

export function escapeFilterValue(value: string): string {
  return value.replace(/[\\*()\0]/g, (ch) => FILTER_ESCAPES[ch] ?? ch);
}

/**
 * `(&(objectClass=person)(|(cn=*ann*)(uid=*ann*)...)(eduPersonPrimaryAffiliation=staff))`
 * with one OR-group per term.
 */
export function buildSearchFilter(
  query: string,
  options: DirectorySearchOptions,
  objectClass: string,
): string {
  const termClauses = splitSearchTerms(query).map((term) => {
    const escaped = escapeFilterValue(term);
    return `(|${SEARCHABLE_ATTRIBUTES.map((attr) => `(${attr}=*${escaped}*)`).join('')})`;
  });

  const type = options.type?.trim();
  const typeClause = type ? `(${AFFILIATION_ATTRIBUTE}=${escapeFilterValue(type)})` : '';

  return `(&(objectClass=${escapeFilterValue(objectClass)})${termClauses.join('')}${typeClause})`;
}

export function buildIdFilter(id: number, objectClass: string, idAttribute: string): string {
  return `(&(objectClass=${escapeFilterValue(objectClass)})(${idAttribute}=${id}))`;
}
