/**
 * # Metadata Constants
 *
 * Type names, reserved document keys and naming conventions shared by the
 * registry, the node model and the document parsers.
 *
 * ## Naming
 *
 * ```
 * acme::model::User          root object, package-qualified
 * acme::model::User/id       field "id" under the object (simple name)
 * ```
 *
 * Packages are separated by `::`. A super reference starting with `::` is
 * relative to the current package; each leading `..::` moves one package up.
 */

export const PKG_SEPARATOR = '::';

/** Wildcard accepted in every slot of a requirement or constraint pattern */
export const WILDCARD = '*';

export const TYPE_NAMES = {
  METADATA: 'metadata',
  LOADER: 'loader',
  OBJECT: 'object',
  FIELD: 'field',
  ATTR: 'attr',
  IDENTITY: 'identity',
  RELATIONSHIP: 'relationship',
  VALIDATOR: 'validator',
  VIEW: 'view',
} as const;

export const BASE_SUBTYPE = 'base';

export const ATTR_SUBTYPES = {
  STRING: 'string',
  INT: 'int',
  LONG: 'long',
  DOUBLE: 'double',
  BOOLEAN: 'boolean',
  STRING_ARRAY: 'stringArray',
  PROPERTIES: 'properties',
  CLASS: 'class',
} as const;

/**
 * Keys on a document record that describe the record itself and never turn
 * into attribute children. `value` is reserved on `attr` records only.
 */
export const RESERVED_KEYS = [
  'name',
  'type',
  'subType',
  'package',
  'super',
  'class',
  'children',
  'override',
  'isOverlay',
  'isAbstract',
  'isInterface',
  'implements',
  'value',
] as const;

export const ATTR_PREFIX = '@';

/** Attributes whose names start with this prefix are never inherited through super */
export const PRIVATE_ATTR_PREFIX = '_';

export const INT32_MIN = -2147483648;
export const INT32_MAX = 2147483647;
export const INT64_MIN = -9223372036854775808n;
export const INT64_MAX = 9223372036854775807n;

export type TypeName = (typeof TYPE_NAMES)[keyof typeof TYPE_NAMES];
export type AttrSubType = (typeof ATTR_SUBTYPES)[keyof typeof ATTR_SUBTYPES];
export type ReservedKey = (typeof RESERVED_KEYS)[number];

const RESERVED_KEY_SET: ReadonlySet<string> = new Set(RESERVED_KEYS);

export function isReservedKey(key: string, recordType: string): key is ReservedKey {
  if (key === 'value') return recordType === TYPE_NAMES.ATTR;
  return RESERVED_KEY_SET.has(key);
}

export function isWildcard(value: string | undefined): boolean {
  return value === undefined || value === WILDCARD;
}

/** `"*"` matches anything; anything else must match exactly */
export function matchesPattern(pattern: string | undefined, value: string): boolean {
  return isWildcard(pattern) || pattern === value;
}
