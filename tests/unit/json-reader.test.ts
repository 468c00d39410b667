/**
 * Tests for the JSON document reader
 */

import { DocumentParseError } from '../../src/errors';
import { readJsonDocument } from '../../src/loader/parser/json-reader';
import { captureError, jsonDocument } from '../helpers/test-fixtures';

const STRICT = { strict: true, requireAttributePrefix: true };

describe('readJsonDocument', () => {
  it('should read the package and nested records', () => {
    const text = jsonDocument('acme::model', [
      { object: { name: 'User', subType: 'pojo', children: [{ field: { name: 'id', subType: 'long' } }] } },
    ]);
    const document = readJsonDocument(text, 'model.json', STRICT);
    expect(document.package).toBe('acme::model');
    expect(document.format).toBe('json');
    expect(document.children).toHaveLength(1);

    const [user] = document.children;
    expect(user.type).toBe('object');
    expect(user.name).toBe('User');
    expect(user.subType).toBe('pojo');
    expect(user.location).toBe('metadata.children[0].object');
    expect(user.children.map((c) => `${c.type}:${c.name}`)).toEqual(['field:id']);
  });

  it('should turn prefixed keys into inline attributes', () => {
    const text = jsonDocument('', [
      { field: { name: 'email', subType: 'string', '@maxLength': 50, '@tags': ['a', 'b'], '@hints': { ui: 'wide' } } },
    ]);
    const [field] = readJsonDocument(text, 'model.json', STRICT).children;
    expect(field.attributes).toEqual([
      { name: 'maxLength', value: '50' },
      { name: 'tags', value: 'a,b', isArray: true },
      { name: 'hints', value: '{"ui":"wide"}', subType: 'properties' },
    ]);
  });

  it('should map reserved flags to typed attributes', () => {
    const text = jsonDocument('', [
      { object: { name: 'Base', subType: 'pojo', isAbstract: true, implements: ['Named', 'Dated'] } },
    ]);
    const [object] = readJsonDocument(text, 'model.json', STRICT).children;
    expect(object.isAbstract).toBe(true);
    expect(object.attributes).toEqual([
      { name: 'isAbstract', value: 'true', subType: 'boolean' },
      { name: 'implements', value: 'Named,Dated', subType: 'stringArray' },
    ]);
  });

  it('should accept override and isOverlay as overlay flags', () => {
    const text = jsonDocument('', [
      { object: { name: 'A', override: true } },
      { object: { name: 'B', isOverlay: 'true' } },
      { object: { name: 'C' } },
    ]);
    expect(readJsonDocument(text, 'model.json', STRICT).children.map((c) => c.isOverlay)).toEqual([true, true, false]);
  });

  it('should reject un-prefixed attribute keys in strict mode', () => {
    const text = jsonDocument('', [{ object: { name: 'User', dbTable: 'users' } }]);
    expect(() => readJsonDocument(text, 'model.json', STRICT)).toThrow(
      "model.json: Attribute 'dbTable' at metadata.children[0].object should be written as '@dbTable'"
    );
  });

  it('should treat value as an attribute key on records other than attr', () => {
    const unprefixed = jsonDocument('', [{ field: { name: 'code', subType: 'string', value: 'abc' } }]);
    expect(() => readJsonDocument(unprefixed, 'model.json', STRICT)).toThrow(
      "model.json: Attribute 'value' at metadata.children[0].field should be written as '@value'"
    );

    const prefixed = jsonDocument('', [{ field: { name: 'code', subType: 'string', '@value': 'abc' } }]);
    const [field] = readJsonDocument(prefixed, 'model.json', STRICT).children;
    expect(field.value).toBeUndefined();
    expect(field.attributes).toEqual([{ name: 'value', value: 'abc' }]);
  });

  it('should keep un-prefixed attribute keys in lenient mode', () => {
    const text = jsonDocument('', [{ object: { name: 'User', dbTable: 'users' } }]);
    const [object] = readJsonDocument(text, 'model.json', { strict: false, requireAttributePrefix: true }).children;
    expect(object.attributes).toEqual([{ name: 'dbTable', value: 'users' }]);
  });

  it('should require exactly one type key per child', () => {
    const text = jsonDocument('', [{ object: { name: 'A' }, field: { name: 'b' } }]);
    expect(() => readJsonDocument(text, 'model.json', STRICT)).toThrow(
      'model.json: Each child must have exactly one type key at metadata.children[0], found: object, field'
    );
  });

  it('should report malformed JSON as a document error', () => {
    const error = captureError(() => readJsonDocument('{ "metadata": ', 'broken.json', STRICT));
    expect(DocumentParseError.isDocumentParseError(error)).toBe(true);
    expect(error instanceof Error ? error.message : '').toMatch(/^broken\.json: Invalid JSON: /);
  });

  it('should require a metadata root', () => {
    expect(() => readJsonDocument('{"children": []}', 'model.json', STRICT)).toThrow(
      /^model\.json: Document must have a "metadata" root/
    );
  });
});
