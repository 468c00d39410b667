/**
 * Tests for metadata path expressions parsed with Chevrotain
 */

import { ConfigurationError } from '../../src/errors';
import { formatPath, toPathExpression } from '../../src/path/meta-data-path';
import { getPathGrammar, parseMetaDataPath } from '../../src/path/path-parser';

describe('parseMetaDataPath', () => {
  it('should parse package-qualified names and optional subTypes', () => {
    expect(parseMetaDataPath('object:acme::User/field:id(long)')).toEqual([
      { type: 'object', name: 'acme::User' },
      { type: 'field', name: 'id', subType: 'long' },
    ]);
  });

  it('should ignore blanks around separators', () => {
    expect(parseMetaDataPath('object : User / field : id')).toEqual([
      { type: 'object', name: 'User' },
      { type: 'field', name: 'id' },
    ]);
  });

  it('should round-trip with toPathExpression', () => {
    const expression = 'object:acme::User(pojo)/field:email(string)';
    expect(toPathExpression(parseMetaDataPath(expression))).toBe(expression);
  });

  it('should reject a segment without a name', () => {
    expect(() => parseMetaDataPath('object')).toThrow(ConfigurationError);
    expect(() => parseMetaDataPath('object')).toThrow(/^Invalid metadata path "object"/);
  });

  it('should reject characters outside the path language', () => {
    expect(() => parseMetaDataPath('object:#x')).toThrow(/unexpected character/);
  });

  it('should expose the grammar rules', () => {
    expect(getPathGrammar().map((rule) => rule.type)).toEqual(['Rule', 'Rule']);
  });
});

describe('formatPath', () => {
  it('should join segments with arrows', () => {
    expect(formatPath([{ type: 'object', name: 'User', subType: 'pojo' }, { type: 'field', name: 'id' }])).toBe(
      'object:User(pojo) → field:id'
    );
  });
});
