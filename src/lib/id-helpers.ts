import ObjectID from 'bson-objectid';
import {
  v4 as UUIDv4,
  v7 as UUIDv7,
  validate as uuidValidate,
  version as uuidVersion,
} from 'uuid';
import { ulid } from 'ulid';

/**
 * Identifier formats the runtime can stamp on events and subscriptions.
 *
 * - `ulid`: 26 Crockford base32 chars, sortable by creation time (default)
 * - `uuid7`: RFC 9562 v7, sortable by creation time
 * - `uuid4`: random
 * - `objectID`: 24 hex chars, MongoDB style
 */
export const IDENTIFIER_TYPES = ['ulid', 'uuid7', 'uuid4', 'objectID'] as const;

export type IdentifierType = (typeof IDENTIFIER_TYPES)[number];

const generators: Record<IdentifierType, () => string> = {
  ulid: () => ulid(),
  uuid7: () => UUIDv7(),
  uuid4: () => UUIDv4(),
  objectID: () => new ObjectID().toHexString(),
};

const validators: Record<IdentifierType, (id: string) => boolean> = {
  ulid: (id) => /^[0-7][0-9A-HJKMNP-TV-Z]{25}$/i.test(id),
  uuid7: (id) => uuidValidate(id) && uuidVersion(id) === 7,
  uuid4: (id) => uuidValidate(id) && uuidVersion(id) === 4,
  objectID: (id) => /^[0-9a-fA-F]{24}$/.test(id),
};

export function isIdentifierType(value: unknown): value is IdentifierType {
  return IDENTIFIER_TYPES.some((type) => type === value);
}

export function generateID(type: IdentifierType = 'ulid'): string {
  return generators[type]();
}

export function validateID(type: IdentifierType, id: unknown): boolean {
  return typeof id === 'string' && validators[type](id);
}
