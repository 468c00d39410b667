/**
 * Tests for the constraint engine: placement, validation, attribute-scoped
 * checks and the enable switches
 */

import { ConstraintEngine, SIBLING_UNIQUE_ID } from '../../src/constraint/constraint-engine';
import {
  allowPlacement,
  forbidPlacement,
  lengthConstraint,
  parseTargetPattern,
  rangeConstraint,
  regexConstraint,
  validationConstraint,
} from '../../src/constraint/factories';
import { createMetaDataContext } from '../../src/context';
import { ConstraintViolationError } from '../../src/errors';
import { captureError, createAttr, createTestContext } from '../helpers/test-fixtures';

function violationOf(fn: () => unknown): ConstraintViolationError {
  const error = captureError(fn);
  if (!ConstraintViolationError.isConstraintViolation(error)) {
    throw new Error(`Expected a constraint violation, got ${String(error)}`);
  }
  return error;
}

describe('ConstraintEngine', () => {
  describe('placement', () => {
    it('should let a forbid win over a matching allow', () => {
      const engine = new ConstraintEngine();
      engine.addConstraint(allowPlacement('allow.fields', 'object', 'field'));
      engine.addConstraint(forbidPlacement('no.secret', 'object', 'field.*.secret'));
      expect(engine.isPlacementAllowed('object', 'pojo', 'field', 'string', 'secret')).toBe(false);
      expect(engine.isPlacementAllowed('object', 'pojo', 'field', 'string', 'name')).toBe(true);
    });

    it('should allow placements no constraint mentions', () => {
      const engine = new ConstraintEngine();
      engine.addConstraint(forbidPlacement('no.secret', 'object', 'field.*.secret'));
      expect(engine.isPlacementAllowed('view', 'text', 'field', 'string', 'secret')).toBe(true);
    });

    it('should reject identities at the root', () => {
      const { registry, createLoader } = createTestContext();
      const loader = createLoader();
      const error = violationOf(() => loader.addChild(registry.createInstance('identity', 'primary', 'pk')));
      expect(error.constraintId).toBe('metadata.root.forbid.identity');
      expect(loader.getChildren()).toHaveLength(0);
    });

    it('should name the forbidding constraint in the message', () => {
      const { registry } = createMetaDataContext({ freeze: false });
      registry.addConstraint(forbidPlacement('no.secret', 'object', 'field.*.secret', 'secrets stay out'));
      const user = registry.createInstance('object', 'pojo', 'acme::User');
      const error = violationOf(() => user.addChild(registry.createInstance('field', 'string', 'secret')));
      expect(error.message).toBe(
        "Placement of field:secret(string) under object:acme::User(pojo) is forbidden by 'no.secret': secrets stay out"
      );
    });

    it('should reject duplicate constraint ids', () => {
      const engine = new ConstraintEngine();
      engine.addConstraint(allowPlacement('dup', 'object', 'field'));
      expect(() => engine.addConstraint(allowPlacement('dup', 'object', 'view'))).toThrow(
        "Constraint 'dup' is already registered"
      );
    });

    it('should list placement and validation constraints together in registration order', () => {
      const engine = new ConstraintEngine();
      engine.addConstraint(allowPlacement('allow.fields', 'object', 'field'));
      engine.addConstraint(rangeConstraint('len.range', 'attr.int.maxLength', { min: 1 }));
      engine.addConstraint(forbidPlacement('no.secret', 'object', 'field.*.secret'));
      expect(engine.getAllValidationConstraints().map((c) => c.id)).toEqual(['allow.fields', 'len.range', 'no.secret']);
      expect(engine.getPlacementConstraints().map((c) => c.id)).toEqual(['allow.fields', 'no.secret']);
      expect(engine.getValidationConstraints().map((c) => c.id)).toEqual(['len.range']);
    });
  });

  describe('sibling uniqueness', () => {
    it('should reject a second child with the same type and name', () => {
      const { registry } = createTestContext();
      const user = registry.createInstance('object', 'pojo', 'acme::User');
      user.addChild(registry.createInstance('field', 'long', 'id'));
      const error = violationOf(() => user.addChild(registry.createInstance('field', 'string', 'id')));
      expect(error.constraintId).toBe(SIBLING_UNIQUE_ID);
      expect(error.message).toBe("Duplicate field 'id' under object:acme::User(pojo)");
      expect(user.getChildren('field')).toHaveLength(1);
    });

    it('should stay on when checking is disabled', () => {
      const { registry } = createTestContext();
      registry.constraints.setEnabled(false);
      const user = registry.createInstance('object', 'pojo', 'acme::User');
      user.addChild(registry.createInstance('field', 'long', 'id'));
      expect(() => user.addChild(registry.createInstance('field', 'long', 'id'))).toThrow(ConstraintViolationError);
    });

    it('should allow the same name for different types', () => {
      const { registry } = createTestContext();
      const user = registry.createInstance('object', 'pojo', 'acme::User');
      user.addChild(registry.createInstance('field', 'long', 'id'));
      expect(() => user.addChild(registry.createInstance('view', 'text', 'id'))).not.toThrow();
    });
  });

  describe('validation', () => {
    it('should reject field names that are not identifiers', () => {
      const { registry } = createTestContext();
      const user = registry.createInstance('object', 'pojo', 'acme::User');
      const error = violationOf(() => user.addChild(registry.createInstance('field', 'string', '1bad')));
      expect(error.constraintId).toBe('field.naming');
      expect(error.value).toBe('1bad');
      expect(error.message).toBe(
        "Constraint 'field.naming' violated by field:1bad(string): field names must be identifiers (value: '1bad')"
      );
    });

    it('should skip disabled types', () => {
      const { registry } = createTestContext();
      registry.constraints.setEnabledForType('field', false);
      const user = registry.createInstance('object', 'pojo', 'acme::User');
      expect(() => user.addChild(registry.createInstance('field', 'string', '1bad'))).not.toThrow();
      expect(registry.constraints.isEnabledFor('field')).toBe(false);
      expect(registry.constraints.getStatus().disabledTypes).toEqual(['field']);
    });

    it('should report predicates that throw', () => {
      const { registry } = createMetaDataContext({ freeze: false });
      registry.addConstraint(
        validationConstraint('boom', 'view', () => {
          throw new Error('kaput');
        })
      );
      const field = registry.createInstance('field', 'string', 'name');
      const error = violationOf(() => field.addChild(registry.createInstance('view', 'text', 'v')));
      expect(error.message).toBe("Constraint 'boom' could not be evaluated on view:v(text): kaput");
    });

    it('should find validation constraints by node and attribute', () => {
      const { registry } = createTestContext();
      const field = registry.createInstance('field', 'string', 'email');
      expect(registry.constraints.findValidationConstraints(field).map((c) => c.id)).toEqual(['field.naming']);
      expect(registry.constraints.findValidationConstraints(field, 'maxLength').map((c) => c.id)).toEqual([
        'field.string.maxLength.range',
      ]);
    });
  });

  describe('attribute-scoped constraints', () => {
    it('should reject duplicate identity fields when the attribute is attached', () => {
      const { registry } = createTestContext();
      const identity = registry.createInstance('identity', 'primary', 'pk');
      const error = violationOf(() => identity.addChild(createAttr(registry, 'stringArray', 'fields', ['id', 'id'])));
      expect(error.constraintId).toBe('identity.fields.unique');
      expect(error.message).toBe("Duplicate field names found in identity 'pk': id");
    });

    it('should check values set on an attached attribute and keep the old value on failure', () => {
      const { registry } = createTestContext();
      const identity = registry.createInstance('identity', 'primary', 'pk');
      const fields = createAttr(registry, 'stringArray', 'fields', ['id']);
      identity.addChild(fields);

      const error = violationOf(() => fields.setValue([]));
      expect(error.constraintId).toBe('identity.fields.nonEmpty');
      expect(fields.getValue()).toEqual(['id']);
    });

    it('should restrict identity generation to known strategies', () => {
      const { registry } = createTestContext();
      const identity = registry.createInstance('identity', 'primary', 'pk');
      const error = violationOf(() => identity.addChild(createAttr(registry, 'string', 'generation', 'random')));
      expect(error.message).toBe(
        "Constraint 'identity.generation.enum' violated by identity:pk(primary): " +
          "must be one of: increment, uuid, assigned (value: 'random')"
      );
    });

    it('should reject a negative maxLength on string fields', () => {
      const { registry } = createTestContext();
      const field = registry.createInstance('field', 'string', 'email');
      const error = violationOf(() => field.addChild(createAttr(registry, 'int', 'maxLength', -1)));
      expect(error.constraintId).toBe('field.string.maxLength.range');
      expect(error.value).toBe(-1);
    });

    it('should check attributes already present on a child being attached', () => {
      const { registry } = createTestContext();
      const user = registry.createInstance('object', 'pojo', 'acme::User');
      const field = registry.createInstance('field', 'string', 'email');
      registry.constraints.setEnabledForType('field', false);
      field.addChild(createAttr(registry, 'int', 'maxLength', -5));
      registry.constraints.setEnabledForType('field', true);

      expect(violationOf(() => user.addChild(field)).constraintId).toBe('field.string.maxLength.range');
    });
  });

  describe('factories', () => {
    it('should parse target patterns with dotted names', () => {
      expect(parseTargetPattern('field.*.a.b')).toEqual({ targetType: 'field', targetSubType: '*', targetName: 'a.b' });
      expect(parseTargetPattern('object')).toEqual({ targetType: 'object', targetSubType: '*', targetName: '*' });
      expect(() => parseTargetPattern('')).toThrow("Invalid constraint target pattern ''");
    });

    it('should anchor regex constraints', () => {
      const { registry } = createTestContext();
      const node = registry.createInstance('field', 'string', 'x');
      const constraint = regexConstraint('lower', 'field', /[a-z]+/);
      expect(constraint.predicate(node, 'abc')).toBe(true);
      expect(constraint.predicate(node, 'abc1')).toBe(false);
    });

    it('should check range and length bounds inclusively', () => {
      const { registry } = createTestContext();
      const node = registry.createInstance('field', 'string', 'x');
      const range = rangeConstraint('r', 'field', { min: 1, max: 3 });
      const length = lengthConstraint('l', 'field', { max: 2 });
      expect([0, 1, 3, 4].map((v) => range.predicate(node, v))).toEqual([false, true, true, false]);
      expect(range.predicate(node, 2n)).toBe(true);
      expect(length.predicate(node, ['a', 'b'])).toBe(true);
      expect(length.predicate(node, 'abc')).toBe(false);
    });
  });
});
