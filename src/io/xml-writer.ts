/**
 * @module io/xml-writer
 *
 * Serializes a tree into the XML document format read by xml-reader, using
 * fast-xml-parser's ordered builder.
 */

import { XMLBuilder } from 'fast-xml-parser';
import { TYPE_NAMES } from '../constants';
import type { MetaData } from '../model/meta-data';
import {
  collectRecords,
  collectRootAttributes,
  type TWriteOptions,
  type TWrittenAttribute,
  type TWrittenRecord,
} from './document-writer';

const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

/** Ordered builder input: one tag key with its children, plus ':@' for attributes */
type TXmlNode = { [key: string]: TXmlNode[] | Record<string, string> | string };

function createBuilder(pretty: boolean): XMLBuilder {
  return new XMLBuilder({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: '',
    suppressEmptyNode: true,
    format: pretty,
    indentBy: '  ',
  });
}

function element(tag: string, attributes: Record<string, string>, children: TXmlNode[]): TXmlNode {
  const node: TXmlNode = { [tag]: children };
  if (Object.keys(attributes).length > 0) {
    node[ATTRIBUTES_KEY] = attributes;
  }
  return node;
}

function attrElement(attribute: TWrittenAttribute): TXmlNode {
  const children: TXmlNode[] = attribute.text ? [{ [TEXT_KEY]: attribute.text }] : [];
  return element(TYPE_NAMES.ATTR, { name: attribute.name, subType: attribute.subType }, children);
}

function toXml(record: TWrittenRecord): TXmlNode {
  const attributes: Record<string, string> = { name: record.name, subType: record.subType };
  if (record.package) attributes.package = record.package;
  if (record.superName) attributes.super = record.superName;
  for (const attribute of record.inline) {
    attributes[attribute.name] = attribute.text ?? '';
  }
  const children = record.children.map((child) => (child.kind === 'attr' ? attrElement(child) : toXml(child)));
  return element(record.type, attributes, children);
}

export function writeXmlDocument(root: MetaData, options: TWriteOptions = {}): string {
  const children: TXmlNode[] = [
    ...collectRootAttributes(root).map(attrElement),
    ...collectRecords(root, 'xml', options).map(toXml),
  ];
  const builder = createBuilder(options.pretty !== false);
  const xml: string = builder.build([element('metadata', {}, children)]);
  return xml.trim();
}
