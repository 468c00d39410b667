import { ATTR_SUBTYPES, BASE_SUBTYPE, TYPE_NAMES } from '../constants';
import { MetaIdentity } from '../model/meta-identity';
import { MetaObject } from '../model/meta-object';
import { MetaRelationship } from '../model/meta-relationship';
import { defineType } from '../registry/type-definition-builder';
import type { TypeRegistry } from '../registry/type-registry';
import type { TMetaDataFactory } from '../registry/types';
import { anyAttribute } from './metadata-types';

const { OBJECT, FIELD, IDENTITY, RELATIONSHIP, VALIDATOR, VIEW } = TYPE_NAMES;
const { STRING, BOOLEAN, STRING_ARRAY } = ATTR_SUBTYPES;

export const createObject: TMetaDataFactory = (init) => new MetaObject(init);
export const createIdentity: TMetaDataFactory = (init) => new MetaIdentity(init);
export const createRelationship: TMetaDataFactory = (init) => new MetaRelationship(init);

const OBJECT_SUBTYPES: Record<string, string> = {
  pojo: 'Plain object with typed properties',
  value: 'Dynamic value object',
  proxy: 'Interface-backed proxy object',
  map: 'Map-backed object',
};

export function registerObjectTypes(registry: TypeRegistry): void {
  registry.registerType(
    defineType(OBJECT, BASE_SUBTYPE)
      .description('Structured object')
      .abstract()
      .factory(createObject)
      .child(anyAttribute())
      .acceptsChildren(FIELD)
      .acceptsChildren(IDENTITY)
      .acceptsChildren(RELATIONSHIP)
      .acceptsChildren(VALIDATOR)
      .acceptsChildren(VIEW)
      .optionalAttribute('isAbstract', BOOLEAN)
      .optionalAttribute('isInterface', BOOLEAN)
      .optionalAttribute('implements', STRING_ARRAY)
      .optionalAttribute('description', STRING)
      .optionalAttribute('object', STRING, 'Implementation class name')
      .build()
  );
  for (const [subType, description] of Object.entries(OBJECT_SUBTYPES)) {
    registry.registerType(
      defineType(OBJECT, subType).inheritsFrom(OBJECT).description(description).factory(createObject).build()
    );
  }
}

export function registerIdentityTypes(registry: TypeRegistry): void {
  registry.registerType(
    defineType(IDENTITY, BASE_SUBTYPE)
      .description('Key made of one or more fields')
      .abstract()
      .factory(createIdentity)
      .child(anyAttribute())
      .requiredAttribute('fields', STRING_ARRAY, 'Names of the fields forming the key')
      .optionalAttribute('generation', STRING, 'increment, uuid or assigned')
      .build()
  );
  registry.registerType(
    defineType(IDENTITY, 'primary')
      .inheritsFrom(IDENTITY)
      .description('Primary key')
      .factory(createIdentity)
      .build()
  );
  registry.registerType(
    defineType(IDENTITY, 'secondary')
      .inheritsFrom(IDENTITY)
      .description('Alternate unique key')
      .factory(createIdentity)
      .build()
  );
}

export function registerRelationshipTypes(registry: TypeRegistry): void {
  registry.registerType(
    defineType(RELATIONSHIP, BASE_SUBTYPE)
      .description('Link to another object')
      .abstract()
      .factory(createRelationship)
      .child(anyAttribute())
      .requiredAttribute('targetObject', STRING)
      .optionalAttribute('cardinality', STRING, 'one or many')
      .optionalAttribute('referencedBy', STRING)
      .build()
  );
  const subTypes: Record<string, string> = {
    composition: 'Target is owned and shares the lifecycle',
    aggregation: 'Target is shared',
    association: 'Target is referenced only',
  };
  for (const [subType, description] of Object.entries(subTypes)) {
    registry.registerType(
      defineType(RELATIONSHIP, subType)
        .inheritsFrom(RELATIONSHIP)
        .description(description)
        .factory(createRelationship)
        .build()
    );
  }
}
