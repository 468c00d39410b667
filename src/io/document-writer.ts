/**
 * @module io/document-writer
 *
 * Format-independent walk of a tree producing the records the JSON and XML
 * writers print. Only local children are written; inherited ones come back
 * through `super` when the document is loaded again.
 *
 * An attribute is written inline when loading the inline text would give it
 * the same subType again (through the type's attribute requirement or through
 * inference). Otherwise it becomes an explicit `attr` record carrying its
 * subType.
 */

import { ATTR_SUBTYPES, TYPE_NAMES, isReservedKey } from '../constants';
import { inferAttrSubType, type TAttrValue } from '../model/attr-codecs';
import type { MetaAttribute } from '../model/meta-attribute';
import type { MetaData } from '../model/meta-data';

export type TWriteFormat = 'json' | 'xml';

export interface TWriteOptions {
  /** Must match the loader's `inferAttributeTypes` for inline values to keep their subType */
  inferAttributeTypes?: boolean;
  /** Indent output; defaults to true */
  pretty?: boolean;
}

export interface TWrittenAttribute {
  kind: 'attr';
  name: string;
  subType: string;
  /** Document text the attribute's codec parses back into the same value */
  text: string | undefined;
  value: TAttrValue | undefined;
}

export interface TWrittenRecord {
  kind: 'record';
  type: string;
  subType: string;
  name: string;
  package?: string;
  superName?: string;
  inline: TWrittenAttribute[];
  /** Explicit attr records and child records, in declaration order */
  children: Array<TWrittenRecord | TWrittenAttribute>;
}

/** Subtypes the XML reader gives reserved flag keys written inline */
const XML_FLAG_SUBTYPES: Record<string, string> = {
  isAbstract: ATTR_SUBTYPES.BOOLEAN,
  isInterface: ATTR_SUBTYPES.BOOLEAN,
  implements: ATTR_SUBTYPES.STRING_ARRAY,
  class: ATTR_SUBTYPES.CLASS,
};

const XML_NAME = /^[A-Za-z_][A-Za-z0-9_.-]*$/;

export function collectRecords(root: MetaData, format: TWriteFormat, options: TWriteOptions = {}): TWrittenRecord[] {
  const infer = options.inferAttributeTypes ?? true;
  return root
    .getChildren(undefined, false)
    .filter((node) => !node.isAttribute())
    .map((node) => toRecord(node, true, format, infer));
}

/** Attributes set directly on the root */
export function collectRootAttributes(root: MetaData): TWrittenAttribute[] {
  return root.getChildren(TYPE_NAMES.ATTR, false).flatMap((c) => (c.isAttribute() ? [toAttribute(c)] : []));
}

function toRecord(node: MetaData, isRoot: boolean, format: TWriteFormat, infer: boolean): TWrittenRecord {
  const record: TWrittenRecord = {
    kind: 'record',
    type: node.type,
    subType: node.subType,
    name: isRoot ? node.getShortName() : node.name,
    inline: [],
    children: [],
  };
  if (isRoot && node.getPackage()) {
    record.package = node.getPackage();
  }
  const superName = superNameOf(node);
  if (superName) {
    record.superName = superName;
  }

  for (const child of node.getChildren(undefined, false)) {
    if (child.isAttribute()) {
      const attribute = toAttribute(child);
      if (canInline(node, attribute, format, infer)) {
        record.inline.push(attribute);
      } else {
        record.children.push(attribute);
      }
    } else {
      record.children.push(toRecord(child, false, format, infer));
    }
  }
  return record;
}

/**
 * Overloaded nodes are rebuilt by merging onto the inherited node, so their
 * super is left implicit.
 */
function superNameOf(node: MetaData): string | undefined {
  const superData = node.getSuperData();
  if (!superData) return undefined;
  const inherited = node.getParent()?.getSuperData()?.findChild(node.type, node.name);
  if (inherited === superData) return undefined;
  return superData.name;
}

function toAttribute(attr: MetaAttribute): TWrittenAttribute {
  const value = attr.getValue();
  return { kind: 'attr', name: attr.name, subType: attr.subType, text: attributeText(attr.subType, value, attr), value };
}

function attributeText(subType: string, value: TAttrValue | undefined, attr: MetaAttribute): string | undefined {
  if (value === undefined) return undefined;
  if (subType === ATTR_SUBTYPES.PROPERTIES) return JSON.stringify(value);
  if (Array.isArray(value) && !isSafeList(value)) return JSON.stringify(value);
  return attr.getValueAsString();
}

/** Items survive a comma join and split unchanged */
export function isSafeList(items: string[]): boolean {
  return items.every((item) => item !== '' && item === item.trim() && !item.includes(',') && !item.startsWith('['));
}

function canInline(node: MetaData, attribute: TWrittenAttribute, format: TWriteFormat, infer: boolean): boolean {
  const { name, subType, value, text } = attribute;
  if (value === undefined || text === undefined) return false;

  const requirement = node.getRegistry().getTypeDefinition(node.type, node.subType)?.attributeRequirements[name];

  if (format === 'json') {
    if (Array.isArray(value)) {
      return isSafeList(value) && (requirement?.subType ?? ATTR_SUBTYPES.STRING_ARRAY) === subType;
    }
    if (subType === ATTR_SUBTYPES.PROPERTIES) {
      return (requirement?.subType ?? ATTR_SUBTYPES.PROPERTIES) === subType;
    }
    return (requirement?.subType ?? guess(text, infer)) === subType;
  }

  if (!XML_NAME.test(name)) return false;
  if (isReservedKey(name, node.type)) {
    const flagSubType = XML_FLAG_SUBTYPES[name];
    if (flagSubType === undefined) return false;
    return (requirement?.subType ?? flagSubType) === subType;
  }
  return (requirement?.subType ?? guess(text, infer)) === subType;
}

function guess(text: string, infer: boolean): string {
  return infer ? inferAttrSubType(text) : ATTR_SUBTYPES.STRING;
}
