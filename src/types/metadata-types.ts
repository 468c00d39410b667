import { ATTR_SUBTYPES, BASE_SUBTYPE, TYPE_NAMES } from '../constants';
import { MetaAttribute } from '../model/meta-attribute';
import { MetaData } from '../model/meta-data';
import { ChildRequirement } from '../registry/child-requirement';
import { defineType } from '../registry/type-definition-builder';
import type { TypeRegistry } from '../registry/type-registry';
import type { TMetaDataFactory } from '../registry/types';

const { METADATA, OBJECT, FIELD, ATTR, VALIDATOR, VIEW } = TYPE_NAMES;

export const createMetaData: TMetaDataFactory = (init) => new MetaData(init);
export const createAttribute: TMetaDataFactory = (init) => new MetaAttribute(init);

/**
 * `metadata.base`: the abstract root every tree root inherits from.
 */
export function registerMetaDataTypes(registry: TypeRegistry): void {
  registry.registerType(
    defineType(METADATA, BASE_SUBTYPE)
      .description('Root of a metadata tree')
      .abstract()
      .factory(createMetaData)
      .acceptsChildren(OBJECT)
      .acceptsChildren(FIELD)
      .acceptsChildren(ATTR)
      .acceptsChildren(VALIDATOR)
      .acceptsChildren(VIEW)
      .build()
  );
}

/**
 * `attr.*`: typed scalar attributes. Attributes never have children.
 */
export function registerAttributeTypes(registry: TypeRegistry): void {
  registry.registerType(
    defineType(ATTR, BASE_SUBTYPE).description('Attribute').abstract().factory(createAttribute).build()
  );

  const descriptions: Record<string, string> = {
    [ATTR_SUBTYPES.STRING]: 'Text value',
    [ATTR_SUBTYPES.INT]: '32-bit integer',
    [ATTR_SUBTYPES.LONG]: '64-bit integer',
    [ATTR_SUBTYPES.DOUBLE]: 'Floating point number',
    [ATTR_SUBTYPES.BOOLEAN]: 'true or false',
    [ATTR_SUBTYPES.STRING_ARRAY]: 'Comma separated list of strings',
    [ATTR_SUBTYPES.PROPERTIES]: 'key=value pairs separated by semicolons',
    [ATTR_SUBTYPES.CLASS]: 'Implementation class name',
  };
  for (const [subType, description] of Object.entries(descriptions)) {
    registry.registerType(
      defineType(ATTR, subType).inheritsFrom(ATTR).description(description).factory(createAttribute).build()
    );
  }
}

/** Wildcard requirement accepting any attribute */
export function anyAttribute(): ChildRequirement {
  return ChildRequirement.many('*', ATTR, '*');
}
