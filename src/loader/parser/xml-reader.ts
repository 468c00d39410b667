/**
 * @module loader/parser/xml-reader
 *
 * Reads the XML encoding of a metadata document:
 *
 * ```xml
 * <metadata package="acme::model">
 *   <object name="User" subType="pojo" dbTable="users">
 *     <field name="id" subType="long"/>
 *     <attr name="note">free text</attr>
 *   </object>
 * </metadata>
 * ```
 *
 * The element name is the record type; XML attributes are either reserved keys
 * or inline attributes. The text of an `<attr>` element is its value.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { TYPE_NAMES, isReservedKey } from '../../constants';
import { DocumentParseError } from '../../errors';
import {
  normalizeRecord,
  type TDocumentRecord,
  type TInlineAttribute,
  type TMetaDataDocument,
  type TReservedValues,
} from './document';

const ROOT_ELEMENT = 'metadata';
const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';
const CHILDREN_WRAPPER = 'children';

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '',
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
});

/** One element of fast-xml-parser's ordered output */
interface TXmlElement {
  tag: string;
  attributes: Record<string, string>;
  children: TXmlElement[];
  text: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Turn the ordered node list into elements. Each list entry is an object with
 * one tag key (holding the nested list) and optionally ':@' for attributes;
 * text nodes use '#text'. Values are not trimmed, so whitespace-only text
 * (indentation) is dropped here and other text keeps its padding.
 */
function toElements(nodes: unknown): TXmlElement[] {
  if (!Array.isArray(nodes)) return [];
  const elements: TXmlElement[] = [];
  for (const node of nodes) {
    if (!isRecord(node)) continue;
    const tag = Object.keys(node).find((k) => k !== ATTRIBUTES_KEY && k !== TEXT_KEY && !k.startsWith('?'));
    if (!tag) continue;

    const attributes: Record<string, string> = {};
    const rawAttributes = node[ATTRIBUTES_KEY];
    if (isRecord(rawAttributes)) {
      for (const [key, value] of Object.entries(rawAttributes)) {
        attributes[key] = String(value);
      }
    }

    const content = node[tag];
    const text = Array.isArray(content)
      ? content
          .filter(isRecord)
          .map((c) => c[TEXT_KEY])
          .filter((t) => t !== undefined)
          .map((t) => String(t))
          .filter((t) => t.trim() !== '')
          .join('')
      : '';
    elements.push({ tag, attributes, children: toElements(content), text });
  }
  return elements;
}

export function readXmlDocument(text: string, sourceName: string): TMetaDataDocument {
  const validation = XMLValidator.validate(text);
  if (validation !== true) {
    throw new DocumentParseError(`Invalid XML: ${validation.err.msg}`, sourceName, validation.err.line);
  }

  const roots = toElements(parser.parse(text));
  const root = roots.find((e) => e.tag === ROOT_ELEMENT);
  if (!root) {
    throw new DocumentParseError(`Document root must be <${ROOT_ELEMENT}>`, sourceName);
  }

  return {
    sourceName,
    format: 'xml',
    package: root.attributes.package ?? root.attributes.defaultPackage ?? '',
    children: readChildren(root.children, ROOT_ELEMENT, sourceName),
  };
}

function readChildren(elements: TXmlElement[], parentLocation: string, sourceName: string): TDocumentRecord[] {
  const records: TDocumentRecord[] = [];
  elements.forEach((element, index) => {
    const location = `${parentLocation}/${element.tag}[${index}]`;
    if (element.tag === CHILDREN_WRAPPER) {
      records.push(...readChildren(element.children, location, sourceName));
    } else {
      records.push(readRecord(element, location, sourceName));
    }
  });
  return records;
}

function readRecord(element: TXmlElement, location: string, sourceName: string): TDocumentRecord {
  const reserved: TReservedValues = {};
  const attributes: TInlineAttribute[] = [];

  for (const [key, value] of Object.entries(element.attributes)) {
    if (isReservedKey(key, element.tag)) {
      reserved[key] = value;
    } else {
      attributes.push({ name: key, value });
    }
  }
  if (element.tag === TYPE_NAMES.ATTR && reserved.value === undefined && element.text !== '') {
    reserved.value = element.text;
  }

  const children = readChildren(element.children, location, sourceName);
  return normalizeRecord(element.tag, reserved, attributes, children, sourceName, location);
}
