import type { DirectoryEntity } from '../../../domain/models/directory-entity.model';
import type { LdapEntry } from '../../../modules/ldap/ldap.service';
import { AFFILIATION_ATTRIBUTE } from './ldap-filter';

type EntityAttribute = Exclude<keyof DirectoryEntity, 'id'>;

/** Directory entity field → LDAP attribute (inetOrgPerson / eduPerson). */
export const LDAP_ATTRIBUTE_MAP: ReadonlyArray<readonly [EntityAttribute, string]> = [
  ['firstName', 'givenName'],
  ['lastName', 'sn'],
  ['fullName', 'cn'],
  ['primaryAffiliation', AFFILIATION_ATTRIBUTE],
  ['jobTitle', 'title'],
  ['department', 'ou'],
  ['departmentMailingAddress', 'postalAddress'],
  ['homePhoneNumber', 'homePhone'],
  ['homeAddress', 'homePostalAddress'],
  ['officePhoneNumber', 'telephoneNumber'],
  ['officeAddress', 'roomNumber'],
  ['faxNumber', 'facsimileTelephoneNumber'],
  ['emailAddress', 'mail'],
  ['username', 'uid'],
];

/** PostalAddress syntax separates lines with `$`. */
const POSTAL_FIELDS: ReadonlySet<EntityAttribute> = new Set<EntityAttribute>([
  'departmentMailingAddress',
  'homeAddress',
]);

export function ldapAttributeList(idAttribute: string): string[] {
  return [idAttribute, ...LDAP_ATTRIBUTE_MAP.map(([, attribute]) => attribute)];
}

/** First value of an attribute; attribute names compare case-insensitively. */
export function readAttribute(entry: LdapEntry, name: string): string | null {
  const wanted = name.toLowerCase();
  const key = Object.keys(entry).find((k) => k.toLowerCase() === wanted);
  if (key === undefined) return null;

  const raw = entry[key];
  const first = Array.isArray(raw) ? raw[0] : raw;
  if (first === undefined) return null;

  const value = Buffer.isBuffer(first) ? first.toString('utf8') : first;
  return value.length > 0 ? value : null;
}

/** Maps an entry to a DirectoryEntity; entries without a numeric id yield null. */
export function toDirectoryEntity(entry: LdapEntry, idAttribute: string): DirectoryEntity | null {
  const rawId = readAttribute(entry, idAttribute);
  if (rawId === null || !/^\d+$/.test(rawId.trim())) return null;

  const entity: DirectoryEntity = {
    id: Number(rawId.trim()),
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

  for (const [field, attribute] of LDAP_ATTRIBUTE_MAP) {
    const value = readAttribute(entry, attribute);
    entity[field] = value !== null && POSTAL_FIELDS.has(field) ? value.split(/\s*\$\s*/).join('\n') : value;
  }

  return entity;
}
