/**
 * End-to-end loading: documents in, typed and merged tree out
 */

import { ConfigurationError, ConstraintViolationError, UnknownTypeError } from '../../src/errors';
import { getDocumentCacheSize } from '../../src/loader/parser';
import { MetaField } from '../../src/model/meta-field';
import { MetaIdentity } from '../../src/model/meta-identity';
import { MetaValidator } from '../../src/model/meta-validator';
import { parseMetaDataPath } from '../../src/path/path-parser';
import { findByPath } from '../../src/path/resolve';
import { setLogLevel, setLogSink } from '../../src/utils/logger';
import { USER_MODEL, captureError, createTestContext, jsonDocument, loadModel } from '../helpers/test-fixtures';

describe('MetaDataLoader', () => {
  describe('loading a single document', () => {
    it('should qualify top-level names with the document package', () => {
      const loader = loadModel(USER_MODEL);
      expect(loader.getMetaObjects().map((o) => o.name)).toEqual(['acme::model::User']);
      expect(loader.getMetaObjectByName('User', 'acme::model').getShortName()).toBe('User');
      expect(loader.hasMetaObject('acme::model::User')).toBe(true);
      expect(loader.hasMetaObject('User')).toBe(false);
    });

    it('should parse attribute text by the requirement subType', () => {
      const email = loadModel(USER_MODEL).getMetaObjectByName('acme::model::User').getMetaField('email');
      expect(email.getAttrValue('maxLength')).toBe(50);
      expect(email.getAttr('maxLength').subType).toBe('int');
    });

    it('should name validators after their subType', () => {
      const email = loadModel(USER_MODEL).getMetaObjectByName('acme::model::User').getMetaField('email');
      expect(email.getValidators().map((v) => v.name)).toEqual(['required']);
      expect(email.isRequired()).toBe(true);
    });

    it('should resolve identity fields to the actual field nodes', () => {
      const user = loadModel(USER_MODEL).getMetaObjectByName('acme::model::User');
      const pk = user.getPrimaryIdentity();
      expect(pk?.getFields()).toEqual(['id']);
      expect(pk?.getMetaFields()[0]).toBe(user.getMetaField('id'));
      expect(pk?.getGeneration()).toBe('increment');
      expect(pk?.isAutoGenerated()).toBe(true);
    });

    it('should record statistics', () => {
      const loader = loadModel(USER_MODEL);
      expect(loader.getStatistics()).toEqual({
        documents: 1,
        records: 5,
        created: 5,
        overlaid: 0,
        attributes: 3,
        skipped: 0,
      });
      expect(loader.getLoadedSources()).toEqual(['model.json']);
      expect(loader.getState()).toBe('LOADED');
    });

    it('should infer subTypes of attributes without a requirement', () => {
      const loader = loadModel(
        jsonDocument('acme', [
          { object: { name: 'Order', subType: 'pojo', '@dbTable': 'orders', '@version': 3, '@ratio': 0.5, '@audited': true } },
        ])
      );
      const order = loader.getMetaObjectByName('acme::Order');
      expect(order.getAttr('dbTable').subType).toBe('string');
      expect(order.getAttr('version').subType).toBe('int');
      expect(order.getAttr('ratio').subType).toBe('double');
      expect(order.getAttrValue('audited')).toBe(true);
    });

    it('should keep attribute text as strings when inference is off', () => {
      const loader = loadModel(
        jsonDocument('acme', [{ object: { name: 'Order', subType: 'pojo', '@version': 3 } }]),
        { inferAttributeTypes: false }
      );
      expect(loader.getMetaObjectByName('acme::Order').getAttrValue('version')).toBe('3');
    });

    it('should prefer the attribute requirement over an attr record subType', () => {
      const loader = createTestContext().createLoader();
      loader
        .loadFromStream(
          '<metadata package="acme"><object name="Account" subType="pojo">' +
            '<field name="email" subType="string"><attr name="maxLength" subType="string">50</attr></field>' +
            '</object></metadata>',
          'account.xml'
        )
        .finish();
      const maxLength = loader.getMetaObjectByName('acme::Account').getMetaField('email').getAttr('maxLength');
      expect(maxLength.subType).toBe('int');
      expect(maxLength.getValue()).toBe(50);
    });

    it('should keep a value attribute on records other than attr', () => {
      const loader = createTestContext().createLoader();
      loader
        .loadFromStream(
          '<metadata package="acme"><object name="Coupon" subType="pojo">' +
            '<field name="code" subType="string" value="abc"/>' +
            '</object></metadata>',
          'coupon.xml'
        )
        .finish();
      const code = loader.getMetaObjectByName('acme::Coupon').getMetaField('code');
      expect(code.hasAttr('value')).toBe(true);
      expect(code.getAttrValue('value')).toBe('abc');
    });

    it('should honour an explicit attr subType', () => {
      const loader = loadModel(
        jsonDocument('acme', [
          {
            object: {
              name: 'Order',
              subType: 'pojo',
              children: [{ attr: { name: 'code', subType: 'string', value: '007' } }],
            },
          },
        ])
      );
      expect(loader.getMetaObjectByName('acme::Order').getAttrValue('code')).toBe('007');
    });
  });

  describe('merging documents', () => {
    it('should merge records with the same type and name', () => {
      const loader = createTestContext().createLoader();
      loader.loadFromStream(USER_MODEL, 'base.json');
      loader.loadFromStream(
        jsonDocument('acme::model', [
          { object: { name: 'User', '@dbTable': 'users', children: [{ field: { name: 'nickname', subType: 'string' } }] } },
        ]),
        'overlay.json'
      );
      loader.finish();

      const user = loader.getMetaObjectByName('acme::model::User');
      expect(loader.getMetaObjects()).toHaveLength(1);
      expect(user.getMetaFields().map((f) => f.name)).toEqual(['id', 'email', 'nickname']);
      expect(user.getAttrValue('dbTable')).toBe('users');
      expect(user.subType).toBe('pojo');
      expect(loader.getStatistics().overlaid).toBe(1);
    });

    it('should merge unnamed validators when the same document loads twice', () => {
      const loader = createTestContext().createLoader();
      loader.loadFromStream(USER_MODEL, 'first.json');
      loader.loadFromStream(USER_MODEL, 'second.json');
      loader.finish();

      const user = loader.getMetaObjectByName('acme::model::User');
      expect(user.getMetaField('email').getValidators().map((v) => v.name)).toEqual(['required']);
      expect(user.getMetaFields().map((f) => f.name)).toEqual(['id', 'email']);
      expect(user.getIdentities()).toHaveLength(1);
      expect(loader.getStatistics().overlaid).toBe(5);
    });

    it('should reject an unnamed validator without a subType', () => {
      const loader = createTestContext().createLoader();
      expect(() =>
        loader.loadFromStream(
          jsonDocument('acme', [
            { object: { name: 'Order', subType: 'pojo', children: [{ field: { name: 'code', subType: 'string', children: [{ validator: {} }] } }] } },
          ]),
          'x.json'
        )
      ).toThrow('validator without a name requires a subType');
    });

    it('should let later attribute values win', () => {
      const loader = createTestContext().createLoader();
      loader.loadFromStream(USER_MODEL, 'base.json');
      loader.loadFromStream(
        jsonDocument('acme::model', [
          { object: { name: 'User', override: true, children: [{ field: { name: 'email', '@maxLength': 120 } }] } },
        ]),
        'overlay.json'
      );
      loader.finish();
      const email = loader.getMetaObjectByName('acme::model::User').getMetaField('email');
      expect(email.getAttrValue('maxLength')).toBe(120);
      expect(email.getAttrs()).toHaveLength(1);
    });

    it('should reject an overlay without a target and poison the loader', () => {
      const loader = createTestContext().createLoader();
      loader.loadFromStream(USER_MODEL, 'base.json');
      const error = captureError(() =>
        loader.loadFromStream(jsonDocument('acme::model', [{ object: { name: 'Ghost', override: true } }]), 'ghost.json')
      );
      expect(ConfigurationError.isConfigurationError(error)).toBe(true);
      expect(error instanceof Error ? error.message : '').toBe(
        "Overlay of object 'acme::model::Ghost' has no existing target in loader:default(base)"
      );
      expect(loader.getState()).toBe('FAILED');
      expect(() => loader.getMetaObjects()).toThrow(/^Loader 'default' failed to load: /);
    });

    it('should reject changing the subType of an existing node', () => {
      const loader = createTestContext().createLoader();
      loader.loadFromStream(USER_MODEL, 'base.json');
      expect(() =>
        loader.loadFromStream(jsonDocument('acme::model', [{ object: { name: 'User', subType: 'map' } }]), 'x.json')
      ).toThrow("Cannot change subType of object:acme::model::User(pojo) to 'map'");
    });
  });

  describe('super references', () => {
    const MODEL = jsonDocument('acme::model', [
      {
        object: {
          name: 'Base',
          subType: 'pojo',
          isAbstract: true,
          '@_table': 'base',
          '@audited': true,
          children: [{ field: { name: 'id', subType: 'long' } }],
        },
      },
      {
        object: {
          name: 'Customer',
          super: 'Base',
          children: [
            { field: { name: 'id', '@description': 'Customer key' } },
            { field: { name: 'name', subType: 'string' } },
          ],
        },
      },
    ]);

    it('should resolve supers within the document package', () => {
      const loader = loadModel(MODEL);
      const customer = loader.getMetaObjectByName('acme::model::Customer');
      expect(customer.getSuperObject()).toBe(loader.getMetaObjectByName('acme::model::Base'));
      expect(customer.subType).toBe('pojo');
    });

    it('should inherit fields and public attributes', () => {
      const customer = loadModel(MODEL).getMetaObjectByName('acme::model::Customer');
      expect(customer.getMetaFields().map((f) => f.name)).toEqual(['id', 'name']);
      expect(customer.getAttrValue('audited')).toBe(true);
      expect(customer.findAttr('_table')).toBeUndefined();
      expect(customer.isAbstract()).toBe(false);
    });

    it('should overload inherited children it redeclares', () => {
      const loader = loadModel(MODEL);
      const base = loader.getMetaObjectByName('acme::model::Base');
      const customer = loader.getMetaObjectByName('acme::model::Customer');
      const customerId = customer.getMetaField('id');

      expect(customerId).not.toBe(base.getMetaField('id'));
      expect(customerId.getSuperData()).toBe(base.getMetaField('id'));
      expect(customerId.getDataType()).toBe('long');
      expect(customerId.getDescription()).toBe('Customer key');
      expect(base.getMetaField('id').getDescription()).toBeUndefined();
      expect(base.isAbstract()).toBe(true);
    });

    it('should resolve relative and absolute super names', () => {
      const loader = createTestContext().createLoader();
      loader.loadFromStream(
        jsonDocument('acme::core', [{ object: { name: 'Entity', subType: 'pojo' } }]),
        'core.json'
      );
      loader.loadFromStream(
        jsonDocument('acme::model', [
          { object: { name: 'A', super: '..::core::Entity' } },
          { object: { name: 'B', super: 'acme::core::Entity' } },
        ]),
        'model.json'
      );
      loader.finish();
      const entity = loader.getMetaObjectByName('acme::core::Entity');
      expect(loader.getMetaObjectByName('acme::model::A').getSuperObject()).toBe(entity);
      expect(loader.getMetaObjectByName('acme::model::B').getSuperObject()).toBe(entity);
    });

    it('should fail on a super that cannot be found', () => {
      const loader = createTestContext().createLoader();
      expect(() =>
        loader.loadFromStream(jsonDocument('acme', [{ object: { name: 'X', super: 'Missing' } }]), 'x.json')
      ).toThrow("Super object 'Missing' of 'acme::X' not found (tried: acme::Missing, Missing)");
    });
  });

  describe('strict and lenient modes', () => {
    const UNKNOWN = jsonDocument('acme', [
      { widget: { name: 'w' } },
      { object: { name: 'Kept', subType: 'pojo' } },
    ]);

    it('should fail on unknown types in strict mode', () => {
      const loader = createTestContext().createLoader();
      const error = captureError(() => loader.loadFromStream(UNKNOWN, 'x.json'));
      expect(UnknownTypeError.isUnknownTypeError(error)).toBe(true);
      expect(ConfigurationError.isConfigurationError(error)).toBe(true);
      if (ConfigurationError.isConfigurationError(error)) {
        expect(error.context.sourceName).toBe('x.json');
        expect(error.context.location).toBe('metadata.children[0].widget');
      }
    });

    it('should skip unknown types and their subtree in lenient mode', () => {
      const loader = createTestContext().createLoader({ strict: false });
      loader.loadFromStream(UNKNOWN, 'x.json').finish();
      expect(loader.getMetaObjects().map((o) => o.name)).toEqual(['acme::Kept']);
      expect(loader.getStatistics().skipped).toBe(1);
    });

    it('should still fail on unresolved supers in lenient mode', () => {
      const loader = createTestContext().createLoader({ strict: false });
      expect(() =>
        loader.loadFromStream(jsonDocument('acme', [{ object: { name: 'X', super: 'Missing' } }]), 'x.json')
      ).toThrow(ConfigurationError);
    });

    it('should reject constraint violations from documents', () => {
      const loader = createTestContext().createLoader();
      const error = captureError(() =>
        loader.loadFromStream(jsonDocument('acme', [{ identity: { name: 'pk', subType: 'primary' } }]), 'x.json')
      );
      expect(ConstraintViolationError.isConstraintViolation(error)).toBe(true);
      expect(loader.getState()).toBe('FAILED');
    });
  });

  describe('validation on finish', () => {
    it('should report missing required attributes', () => {
      const loader = createTestContext().createLoader();
      loader.loadFromStream(
        jsonDocument('acme', [
          { object: { name: 'Order', subType: 'pojo', children: [{ relationship: { name: 'lines', subType: 'composition' } }] } },
        ]),
        'order.json'
      );
      expect(() => loader.finish()).toThrow(
        "Metadata validation failed:\n  - object:acme::Order(pojo) → relationship:lines(composition) is missing required attribute 'targetObject' (string)"
      );
      expect(loader.getState()).toBe('FAILED');
    });

    it('should report identities naming unknown fields', () => {
      const loader = createTestContext().createLoader({ validateOnLoad: false });
      loader.loadFromStream(
        jsonDocument('acme', [
          { object: { name: 'Order', subType: 'pojo', children: [{ identity: { name: 'pk', subType: 'primary', '@fields': ['nope'] } }] } },
        ]),
        'order.json'
      );
      const result = loader.validate();
      expect(result.valid).toBe(false);
      expect(result.errors.map((e) => e.code)).toEqual(['UNKNOWN_IDENTITY_FIELD']);
      expect(() => loader.finish()).not.toThrow();
    });

    it('should resolve relationship targets in the owner package', () => {
      const loader = loadModel(
        jsonDocument('acme', [
          { object: { name: 'Line', subType: 'pojo' } },
          {
            object: {
              name: 'Order',
              subType: 'pojo',
              children: [{ relationship: { name: 'lines', subType: 'composition', '@targetObject': 'Line', '@cardinality': 'many' } }],
            },
          },
        ])
      );
      const [lines] = loader.getMetaObjectByName('acme::Order').getRelationships();
      expect(lines.findTargetObjectNode()).toBe(loader.getMetaObjectByName('acme::Line'));
      expect(lines.isOneToMany()).toBe(true);
      expect(lines.getLifecycle()).toBe('dependent');
    });
  });

  describe('after finish', () => {
    it('should make the tree read-only', () => {
      const loader = loadModel(USER_MODEL);
      const email = loader.getMetaObjectByName('acme::model::User').getMetaField('email');
      expect(() => email.getAttr('maxLength').setValue(10)).toThrow(/the tree is final/);
      expect(() => loader.loadFromStream(USER_MODEL, 'again.json')).toThrow(
        "Loader 'default' is finished and cannot load more documents"
      );
    });

    it('should find nodes by path expression', () => {
      const loader = loadModel(USER_MODEL);
      const node = loader.getMetaDataByPath('object:acme::model::User/field:email(string)/validator:required');
      expect(MetaValidator.isMetaValidator(node)).toBe(true);
      expect(() => loader.getMetaDataByPath('object:acme::model::User/field:email(long)')).toThrow(
        "field(long) 'email' not found in object:acme::model::User(pojo)"
      );
    });

    it('should return undefined from findByPath on a miss', () => {
      const loader = loadModel(USER_MODEL);
      expect(findByPath(loader, parseMetaDataPath('object:acme::model::User/field:phone'))).toBeUndefined();
      expect(findByPath(loader, parseMetaDataPath('object:acme::model::User/identity:pk'))?.subType).toBe('primary');
    });

    it('should parse identical documents once', () => {
      loadModel(USER_MODEL);
      loadModel(USER_MODEL);
      expect(getDocumentCacheSize()).toBe(1);
    });

    it('should narrow nodes with the type guards', () => {
      const user = loadModel(USER_MODEL).getMetaObjectByName('acme::model::User');
      expect(user.getChildren().filter(MetaField.isMetaField)).toHaveLength(2);
      expect(user.getChildren().filter(MetaIdentity.isMetaIdentity)).toHaveLength(1);
    });
  });

  describe('verbose mode', () => {
    it('should log per-document statistics', () => {
      const lines: string[] = [];
      const previous = setLogSink((level, line) => lines.push(`${level} ${line}`));
      setLogLevel('info');
      try {
        loadModel(USER_MODEL, { verbose: true });
      } finally {
        setLogSink(previous);
        setLogLevel('silent');
      }
      expect(lines).toEqual(['info [loader] model.json: 5 created, 0 overlaid, 3 attributes, 0 skipped']);
    });
  });

  describe('options', () => {
    it('should reject unknown options', () => {
      expect(() => createTestContext().createLoader({ strict: true, ...{ unknownFlag: 1 } })).toThrow(
        /^Invalid loader options: /
      );
    });
  });
});
