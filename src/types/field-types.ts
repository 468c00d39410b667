import { ATTR_SUBTYPES, BASE_SUBTYPE, TYPE_NAMES } from '../constants';
import { MetaField } from '../model/meta-field';
import { defineType, type TypeDefinitionBuilder } from '../registry/type-definition-builder';
import type { TypeRegistry } from '../registry/type-registry';
import type { TMetaDataFactory } from '../registry/types';
import { anyAttribute } from './metadata-types';

const { FIELD, VALIDATOR, VIEW } = TYPE_NAMES;
const { STRING, INT, LONG, DOUBLE, BOOLEAN } = ATTR_SUBTYPES;

export const createField: TMetaDataFactory = (init) => new MetaField(init);

function field(subType: string, description: string): TypeDefinitionBuilder {
  return defineType(FIELD, subType).inheritsFrom(FIELD).description(description).factory(createField);
}

function withBounds(builder: TypeDefinitionBuilder, boundSubType: string): TypeDefinitionBuilder {
  return builder.optionalAttribute('minValue', boundSubType).optionalAttribute('maxValue', boundSubType);
}

export function registerFieldTypes(registry: TypeRegistry): void {
  registry.registerType(
    defineType(FIELD, BASE_SUBTYPE)
      .description('Data field')
      .abstract()
      .factory(createField)
      .child(anyAttribute())
      .acceptsChildren(VALIDATOR)
      .acceptsChildren(VIEW)
      .optionalAttribute('isAbstract', BOOLEAN)
      .optionalAttribute('required', BOOLEAN)
      .optionalAttribute('defaultValue', STRING)
      .optionalAttribute('description', STRING)
      .optionalAttribute('isArray', BOOLEAN)
      .build()
  );

  const definitions = [
    field('string', 'Text')
      .optionalAttribute('maxLength', INT)
      .optionalAttribute('minLength', INT)
      .optionalAttribute('pattern', STRING),
    withBounds(field('int', '32-bit integer'), INT),
    withBounds(field('long', '64-bit integer'), LONG),
    withBounds(field('double', 'Floating point number'), DOUBLE),
    withBounds(field('decimal', 'Fixed precision decimal'), DOUBLE)
      .optionalAttribute('precision', INT)
      .optionalAttribute('scale', INT),
    field('boolean', 'Boolean flag'),
    field('date', 'Calendar date').optionalAttribute('format', STRING),
    field('time', 'Time of day').optionalAttribute('format', STRING),
    field('timestamp', 'Date and time').optionalAttribute('format', STRING),
    field('stringArray', 'List of strings'),
    field('object', 'Reference to another object').optionalAttribute('objectRef', STRING),
    field('class', 'Class name'),
  ];
  for (const definition of definitions) {
    registry.registerType(definition.build());
  }
}
