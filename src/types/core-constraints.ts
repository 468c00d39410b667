import { TYPE_NAMES } from '../constants';
import {
  allowPlacement,
  enumConstraint,
  forbidPlacement,
  lengthConstraint,
  rangeConstraint,
  uniqueEntriesConstraint,
  validationConstraint,
} from '../constraint/factories';
import type { Constraint } from '../constraint/types';
import { IDENTITY_GENERATIONS } from '../model/meta-identity';

const { LOADER, OBJECT, FIELD, ATTR, IDENTITY, RELATIONSHIP, VALIDATOR, VIEW } = TYPE_NAMES;

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export function createCoreConstraints(): Constraint[] {
  return [
    // Root placement
    allowPlacement('metadata.root.object', LOADER, OBJECT),
    allowPlacement('metadata.root.field', LOADER, FIELD),
    allowPlacement('metadata.root.attr', LOADER, ATTR),
    allowPlacement('metadata.root.validator', LOADER, VALIDATOR),
    allowPlacement('metadata.root.view', LOADER, VIEW),
    forbidPlacement('metadata.root.forbid.identity', LOADER, IDENTITY, 'identities must be declared on an object'),
    forbidPlacement(
      'metadata.root.forbid.relationship',
      LOADER,
      RELATIONSHIP,
      'relationships must be declared on an object'
    ),

    // Nesting
    allowPlacement('object.children.field', OBJECT, FIELD),
    allowPlacement('object.children.identity', OBJECT, IDENTITY),
    allowPlacement('object.children.relationship', OBJECT, RELATIONSHIP),
    allowPlacement('field.children.validator', FIELD, VALIDATOR),
    allowPlacement('field.children.view', FIELD, VIEW),
    forbidPlacement('field.forbid.object', FIELD, OBJECT, 'objects cannot be nested inside fields'),
    forbidPlacement('field.forbid.identity', FIELD, IDENTITY, 'identities belong to objects'),
    forbidPlacement('attr.forbid.children', ATTR, '*', 'attributes cannot have children'),

    // Naming
    validationConstraint('object.naming', OBJECT, (node) => IDENTIFIER.test(node.getShortName()), {
      description: 'object names must be identifiers',
    }),
    validationConstraint('field.naming', FIELD, (node) => IDENTIFIER.test(node.getShortName()), {
      description: 'field names must be identifiers',
    }),

    // Attribute values
    enumConstraint('identity.generation.enum', IDENTITY, IDENTITY_GENERATIONS, { attributeName: 'generation' }),
    lengthConstraint('identity.fields.nonEmpty', IDENTITY, { min: 1 }, {
      attributeName: 'fields',
      description: 'an identity needs at least one field',
    }),
    uniqueEntriesConstraint('identity.fields.unique', IDENTITY, 'fields', 'field names'),
    enumConstraint('relationship.cardinality.enum', RELATIONSHIP, ['one', 'many'], {
      attributeName: 'cardinality',
    }),
    rangeConstraint('field.string.maxLength.range', `${FIELD}.string`, { min: 0 }, { attributeName: 'maxLength' }),
    rangeConstraint('field.string.minLength.range', `${FIELD}.string`, { min: 0 }, { attributeName: 'minLength' }),
  ];
}
