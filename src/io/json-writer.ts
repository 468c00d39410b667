/**
 * @module io/json-writer
 *
 * Serializes a tree into the JSON document format read by json-reader.
 */

import { ATTR_PREFIX, TYPE_NAMES } from '../constants';
import type { MetaData } from '../model/meta-data';
import {
  collectRecords,
  collectRootAttributes,
  type TWriteOptions,
  type TWrittenAttribute,
  type TWrittenRecord,
} from './document-writer';

type TJsonValue = string | number | boolean | null | TJsonValue[] | { [key: string]: TJsonValue };
type TJsonObject = { [key: string]: TJsonValue };

function inlineValue(attribute: TWrittenAttribute): TJsonValue {
  const { value, text = '' } = attribute;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value;
  if (Array.isArray(value)) return [...value];
  if (typeof value === 'object') return { ...value };
  return text;
}

function attrRecord(attribute: TWrittenAttribute): TJsonObject {
  const body: TJsonObject = { name: attribute.name, subType: attribute.subType };
  if (attribute.text !== undefined) body.value = attribute.text;
  return { [TYPE_NAMES.ATTR]: body };
}

function toJson(record: TWrittenRecord): TJsonObject {
  const body: TJsonObject = { name: record.name, subType: record.subType };
  if (record.package) body.package = record.package;
  if (record.superName) body.super = record.superName;
  for (const attribute of record.inline) {
    body[`${ATTR_PREFIX}${attribute.name}`] = inlineValue(attribute);
  }
  if (record.children.length > 0) {
    body.children = record.children.map((child) => (child.kind === 'attr' ? attrRecord(child) : toJson(child)));
  }
  return { [record.type]: body };
}

/**
 * Document text that loads back into an equivalent tree. Root names are
 * written short with their package beside them.
 */
export function writeJsonDocument(root: MetaData, options: TWriteOptions = {}): string {
  const children: TJsonValue[] = [
    ...collectRootAttributes(root).map(attrRecord),
    ...collectRecords(root, 'json', options).map(toJson),
  ];
  const document: TJsonObject = { metadata: { children } };
  return options.pretty === false ? JSON.stringify(document) : JSON.stringify(document, null, 2);
}
