/**
 * @module loader/parser/json-reader
 *
 * Reads the JSON encoding of a metadata document:
 *
 * ```json
 * { "metadata": { "package": "acme::model", "children": [
 *   { "object": { "name": "User", "subType": "pojo", "@dbTable": "users",
 *                 "children": [ { "field": { "name": "id", "subType": "long" } } ] } }
 * ] } }
 * ```
 */

import { z } from 'zod';
import { ATTR_PREFIX, ATTR_SUBTYPES, isReservedKey } from '../../constants';
import { DocumentParseError } from '../../errors';
import { getErrorMessage } from '../../utils/error-utils';
import { createLogger } from '../../utils/logger';
import {
  normalizeRecord,
  scalarToString,
  type TDocumentRecord,
  type TInlineAttribute,
  type TMetaDataDocument,
  type TReservedValues,
} from './document';

const log = createLogger('json');

const JsonEnvelopeSchema = z.object({
  metadata: z
    .object({
      package: z.string().optional(),
      defaultPackage: z.string().optional(),
      children: z.array(z.record(z.unknown())).default([]),
    })
    .passthrough(),
});

export interface TJsonReadOptions {
  strict: boolean;
  requireAttributePrefix: boolean;
}

export function readJsonDocument(
  text: string,
  sourceName: string,
  options: TJsonReadOptions
): TMetaDataDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new DocumentParseError(`Invalid JSON: ${getErrorMessage(error)}`, sourceName, undefined, {
      cause: error,
    });
  }

  const envelope = JsonEnvelopeSchema.safeParse(raw);
  if (!envelope.success) {
    const issue = envelope.error.issues[0];
    throw new DocumentParseError(
      `Document must have a "metadata" root with a "children" array (${issue.path.join('.')}: ${issue.message})`,
      sourceName
    );
  }

  const { metadata } = envelope.data;
  const reader = new JsonRecordReader(sourceName, options);
  return {
    sourceName,
    format: 'json',
    package: metadata.package ?? metadata.defaultPackage ?? '',
    children: reader.readChildren(metadata.children, 'metadata'),
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

class JsonRecordReader {
  constructor(
    private readonly sourceName: string,
    private readonly options: TJsonReadOptions
  ) {}

  readChildren(entries: unknown[], parentLocation: string): TDocumentRecord[] {
    return entries.map((entry, index) => this.readEntry(entry, `${parentLocation}.children[${index}]`));
  }

  private readEntry(entry: unknown, location: string): TDocumentRecord {
    if (!isPlainObject(entry)) {
      throw new DocumentParseError(`Expected an object at ${location}`, this.sourceName);
    }
    const keys = Object.keys(entry);
    if (keys.length !== 1) {
      throw new DocumentParseError(
        `Each child must have exactly one type key at ${location}, found: ${keys.join(', ') || 'none'}`,
        this.sourceName
      );
    }
    const type = keys[0];
    const body = entry[type];
    if (!isPlainObject(body)) {
      throw new DocumentParseError(`Body of '${type}' must be an object at ${location}`, this.sourceName);
    }
    return this.readRecord(type, body, `${location}.${type}`);
  }

  private readRecord(type: string, body: Record<string, unknown>, location: string): TDocumentRecord {
    const reserved: TReservedValues = {};
    const attributes: TInlineAttribute[] = [];
    let children: TDocumentRecord[] = [];

    for (const [key, value] of Object.entries(body)) {
      if (key === 'children') {
        if (!Array.isArray(value)) {
          throw new DocumentParseError(`'children' must be an array at ${location}`, this.sourceName);
        }
        children = this.readChildren(value, location);
      } else if (key.startsWith(ATTR_PREFIX)) {
        attributes.push(this.readAttribute(key.substring(ATTR_PREFIX.length), value, location));
      } else if (isReservedKey(key, type)) {
        reserved[key] = value;
      } else {
        this.checkUnprefixed(key, location);
        attributes.push(this.readAttribute(key, value, location));
      }
    }

    return normalizeRecord(type, reserved, attributes, children, this.sourceName, location);
  }

  private checkUnprefixed(key: string, location: string): void {
    if (!this.options.requireAttributePrefix) return;
    const message = `Attribute '${key}' at ${location} should be written as '${ATTR_PREFIX}${key}'`;
    if (this.options.strict) {
      throw new DocumentParseError(message, this.sourceName);
    }
    log.warn(`${this.sourceName}: ${message}`);
  }

  private readAttribute(name: string, value: unknown, location: string): TInlineAttribute {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      return { name, value: scalarToString(value) };
    }
    if (Array.isArray(value)) {
      const items = value.map((item: unknown) => {
        if (typeof item === 'string' || typeof item === 'number' || typeof item === 'boolean') {
          return scalarToString(item);
        }
        throw new DocumentParseError(`Attribute '${name}' at ${location} must hold scalars`, this.sourceName);
      });
      return { name, value: items.join(','), isArray: true };
    }
    if (isPlainObject(value)) {
      return { name, value: JSON.stringify(value), subType: ATTR_SUBTYPES.PROPERTIES };
    }
    throw new DocumentParseError(`Attribute '${name}' at ${location} has no usable value`, this.sourceName);
  }
}
