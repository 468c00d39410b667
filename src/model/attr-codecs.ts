/**
 * Conversions between attribute text (as found in documents) and typed
 * attribute values, one codec per attr subType.
 */

import { ATTR_SUBTYPES, INT32_MAX, INT32_MIN, INT64_MAX, INT64_MIN } from '../constants';
import { ConfigurationError } from '../errors';

export type TAttrValue = string | number | bigint | boolean | string[] | Record<string, string>;

export interface TAttrCodec {
  /** Parse document text */
  parse(text: string): TAttrValue;
  /** Validate and normalize a programmatic value */
  coerce(value: TAttrValue): TAttrValue;
  format(value: TAttrValue): string;
}

const INTEGER_PATTERN = /^-?\d+$/;
const DECIMAL_PATTERN = /^-?\d*\.\d+([eE][+-]?\d+)?$/;

function invalid(subType: string, value: unknown, cause?: unknown): ConfigurationError {
  const shown = typeof value === 'object' ? JSON.stringify(value) : String(value);
  return new ConfigurationError(`Invalid ${subType} attribute value: ${shown}`, { subType }, { cause });
}

function parseJson(subType: string, text: string): unknown {
  try {
    return JSON.parse(text.trim());
  } catch (error) {
    throw invalid(subType, text, error);
  }
}

function isStringRecord(value: TAttrValue): value is Record<string, string> {
  return typeof value === 'object' && !Array.isArray(value);
}

function formatScalar(value: TAttrValue): string {
  if (Array.isArray(value)) return value.join(',');
  if (isStringRecord(value)) {
    return Object.entries(value)
      .map(([k, v]) => `${k}=${v}`)
      .join(';');
  }
  return String(value);
}

const stringCodec: TAttrCodec = {
  parse: (text) => text,
  coerce: (value) => formatScalar(value),
  format: formatScalar,
};

const intCodec: TAttrCodec = {
  parse(text) {
    const trimmed = text.trim();
    if (!INTEGER_PATTERN.test(trimmed)) throw invalid(ATTR_SUBTYPES.INT, text);
    return intCodec.coerce(Number(trimmed));
  },
  coerce(value) {
    if (typeof value === 'string') return intCodec.parse(value);
    if (typeof value === 'bigint') return intCodec.coerce(Number(value));
    if (typeof value !== 'number' || !Number.isInteger(value) || value < INT32_MIN || value > INT32_MAX) {
      throw invalid(ATTR_SUBTYPES.INT, value);
    }
    return value;
  },
  format: formatScalar,
};

const longCodec: TAttrCodec = {
  parse(text) {
    const trimmed = text.trim();
    if (!INTEGER_PATTERN.test(trimmed)) throw invalid(ATTR_SUBTYPES.LONG, text);
    return longCodec.coerce(BigInt(trimmed));
  },
  coerce(value) {
    if (typeof value === 'string') return longCodec.parse(value);
    if (typeof value === 'number' && Number.isInteger(value)) return longCodec.coerce(BigInt(value));
    if (typeof value !== 'bigint' || value < INT64_MIN || value > INT64_MAX) {
      throw invalid(ATTR_SUBTYPES.LONG, value);
    }
    return value;
  },
  format: formatScalar,
};

const doubleCodec: TAttrCodec = {
  parse(text) {
    const trimmed = text.trim();
    const parsed = Number(trimmed);
    if (trimmed === '' || !Number.isFinite(parsed)) throw invalid(ATTR_SUBTYPES.DOUBLE, text);
    return parsed;
  },
  coerce(value) {
    if (typeof value === 'string') return doubleCodec.parse(value);
    if (typeof value === 'bigint') return Number(value);
    if (typeof value !== 'number' || !Number.isFinite(value)) throw invalid(ATTR_SUBTYPES.DOUBLE, value);
    return value;
  },
  format: formatScalar,
};

const booleanCodec: TAttrCodec = {
  parse(text) {
    const lowered = text.trim().toLowerCase();
    if (lowered === 'true') return true;
    if (lowered === 'false') return false;
    throw invalid(ATTR_SUBTYPES.BOOLEAN, text);
  },
  coerce(value) {
    if (typeof value === 'string') return booleanCodec.parse(value);
    if (typeof value !== 'boolean') throw invalid(ATTR_SUBTYPES.BOOLEAN, value);
    return value;
  },
  format: formatScalar,
};

const stringArrayCodec: TAttrCodec = {
  parse(text) {
    const trimmed = text.trim();
    if (trimmed.startsWith('[')) {
      const parsed = parseJson(ATTR_SUBTYPES.STRING_ARRAY, text);
      if (!Array.isArray(parsed)) throw invalid(ATTR_SUBTYPES.STRING_ARRAY, text);
      return parsed.map((item: unknown) => String(item));
    }
    return trimmed
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s.length > 0);
  },
  coerce(value) {
    if (typeof value === 'string') return stringArrayCodec.parse(value);
    if (!Array.isArray(value)) throw invalid(ATTR_SUBTYPES.STRING_ARRAY, value);
    return [...value];
  },
  format: formatScalar,
};

const propertiesCodec: TAttrCodec = {
  parse(text) {
    const trimmed = text.trim();
    const result: Record<string, string> = {};
    if (trimmed.startsWith('{')) {
      const parsed = parseJson(ATTR_SUBTYPES.PROPERTIES, text);
      if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw invalid(ATTR_SUBTYPES.PROPERTIES, text);
      }
      for (const [key, value] of Object.entries(parsed)) {
        result[key] = String(value);
      }
      return result;
    }
    for (const pair of trimmed.split(';')) {
      if (pair.trim() === '') continue;
      const eq = pair.indexOf('=');
      if (eq <= 0) throw invalid(ATTR_SUBTYPES.PROPERTIES, text);
      result[pair.substring(0, eq).trim()] = pair.substring(eq + 1).trim();
    }
    return result;
  },
  coerce(value) {
    if (typeof value === 'string') return propertiesCodec.parse(value);
    if (!isStringRecord(value)) throw invalid(ATTR_SUBTYPES.PROPERTIES, value);
    return { ...value };
  },
  format: formatScalar,
};

const CODECS: Record<string, TAttrCodec> = {
  [ATTR_SUBTYPES.STRING]: stringCodec,
  [ATTR_SUBTYPES.CLASS]: stringCodec,
  [ATTR_SUBTYPES.INT]: intCodec,
  [ATTR_SUBTYPES.LONG]: longCodec,
  [ATTR_SUBTYPES.DOUBLE]: doubleCodec,
  [ATTR_SUBTYPES.BOOLEAN]: booleanCodec,
  [ATTR_SUBTYPES.STRING_ARRAY]: stringArrayCodec,
  [ATTR_SUBTYPES.PROPERTIES]: propertiesCodec,
};

/** Codec for an attr subType; unknown subTypes are treated as text */
export function getAttrCodec(subType: string): TAttrCodec {
  return CODECS[subType] ?? stringCodec;
}

/**
 * Subtype a literal looks like: `true|false` → boolean, integers → int or
 * long by range, decimals → double, anything else → string.
 */
export function inferAttrSubType(text: string): string {
  const trimmed = text.trim();
  if (trimmed === 'true' || trimmed === 'false') return ATTR_SUBTYPES.BOOLEAN;
  if (INTEGER_PATTERN.test(trimmed)) {
    const big = BigInt(trimmed);
    if (big >= BigInt(INT32_MIN) && big <= BigInt(INT32_MAX)) return ATTR_SUBTYPES.INT;
    if (big >= INT64_MIN && big <= INT64_MAX) return ATTR_SUBTYPES.LONG;
    return ATTR_SUBTYPES.STRING;
  }
  if (DECIMAL_PATTERN.test(trimmed)) return ATTR_SUBTYPES.DOUBLE;
  return ATTR_SUBTYPES.STRING;
}
