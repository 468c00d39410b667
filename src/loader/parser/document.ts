/**
 * @module loader/parser/document
 *
 * Format-independent view of a metadata document. The XML and JSON readers
 * both produce a TMetaDataDocument; the record processor only ever sees this
 * shape.
 */

import { ATTR_SUBTYPES, type ReservedKey } from '../../constants';
import { DocumentParseError } from '../../errors';

export type TDocumentFormat = 'json' | 'xml';

export interface TInlineAttribute {
  name: string;
  value: string;
  /** Explicit subType; otherwise resolved from requirements or the value */
  subType?: string;
  /** Value came from a list */
  isArray?: boolean;
}

export interface TDocumentRecord {
  /** Element name / JSON key: `object`, `field`, `attr`, ... */
  type: string;
  subType?: string;
  name?: string;
  package?: string;
  superName?: string;
  className?: string;
  isOverlay: boolean;
  isAbstract: boolean;
  /** Value of `attr` records */
  value?: string;
  attributes: TInlineAttribute[];
  children: TDocumentRecord[];
  /** Position inside the document, for diagnostics */
  location: string;
}

export interface TMetaDataDocument {
  sourceName: string;
  format: TDocumentFormat;
  package: string;
  children: TDocumentRecord[];
}

export type TScalar = string | number | boolean;

export type TReservedValues = Partial<Record<ReservedKey, unknown>>;

export function detectFormat(text: string, sourceName = ''): TDocumentFormat {
  const lower = sourceName.toLowerCase();
  if (lower.endsWith('.json')) return 'json';
  if (lower.endsWith('.xml')) return 'xml';
  return text.trimStart().startsWith('<') ? 'xml' : 'json';
}

export function scalarToString(value: TScalar): string {
  return typeof value === 'string' ? value : String(value);
}

function asString(value: unknown, key: string, sourceName: string, location: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return scalarToString(value);
  }
  throw new DocumentParseError(`'${key}' must be a string at ${location}`, sourceName);
}

function asBoolean(value: unknown, key: string, sourceName: string, location: string): boolean {
  if (value === undefined || value === null) return false;
  if (typeof value === 'boolean') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  throw new DocumentParseError(`'${key}' must be true or false at ${location}`, sourceName);
}

function asList(value: unknown, key: string, sourceName: string, location: string): string | undefined {
  if (Array.isArray(value)) {
    return value.map((v: unknown) => asString(v, key, sourceName, location) ?? '').join(',');
  }
  return asString(value, key, sourceName, location);
}

/**
 * Build a record from the reserved keys a reader collected. Flags that the
 * tree stores as attributes (`isAbstract`, `isInterface`, `implements`,
 * `class`) are turned into typed inline attributes here.
 */
export function normalizeRecord(
  type: string,
  reserved: TReservedValues,
  attributes: TInlineAttribute[],
  children: TDocumentRecord[],
  sourceName: string,
  location: string
): TDocumentRecord {
  const str = (key: ReservedKey) => asString(reserved[key], key, sourceName, location);
  const bool = (key: ReservedKey) => asBoolean(reserved[key], key, sourceName, location);

  const subType = str('subType') ?? str('type');
  const isAbstract = bool('isAbstract');
  const flagAttributes: TInlineAttribute[] = [];
  if (reserved.isAbstract !== undefined) {
    flagAttributes.push({ name: 'isAbstract', value: String(isAbstract), subType: ATTR_SUBTYPES.BOOLEAN });
  }
  if (reserved.isInterface !== undefined) {
    flagAttributes.push({
      name: 'isInterface',
      value: String(bool('isInterface')),
      subType: ATTR_SUBTYPES.BOOLEAN,
    });
  }
  const implementsList = asList(reserved.implements, 'implements', sourceName, location);
  if (implementsList !== undefined) {
    flagAttributes.push({ name: 'implements', value: implementsList, subType: ATTR_SUBTYPES.STRING_ARRAY });
  }
  const className = str('class');
  if (className !== undefined) {
    flagAttributes.push({ name: 'class', value: className, subType: ATTR_SUBTYPES.CLASS });
  }

  return {
    type,
    subType: subType === '' ? undefined : subType,
    name: str('name') || undefined,
    package: str('package'),
    superName: str('super') || undefined,
    className,
    isOverlay: bool('override') || bool('isOverlay'),
    isAbstract,
    value: asList(reserved.value, 'value', sourceName, location),
    attributes: [...flagAttributes, ...attributes],
    children,
    location,
  };
}
