import { ATTR_SUBTYPES, BASE_SUBTYPE, TYPE_NAMES } from '../constants';
import { MetaValidator } from '../model/meta-validator';
import { MetaView } from '../model/meta-view';
import { defineType } from '../registry/type-definition-builder';
import type { TypeRegistry } from '../registry/type-registry';
import type { TMetaDataFactory } from '../registry/types';
import { anyAttribute } from './metadata-types';

const { VALIDATOR, VIEW } = TYPE_NAMES;
const { STRING, INT, DOUBLE } = ATTR_SUBTYPES;

export const createValidator: TMetaDataFactory = (init) => new MetaValidator(init);
export const createView: TMetaDataFactory = (init) => new MetaView(init);

export function registerValidatorTypes(registry: TypeRegistry): void {
  registry.registerType(
    defineType(VALIDATOR, BASE_SUBTYPE)
      .description('Value validation rule')
      .abstract()
      .factory(createValidator)
      .child(anyAttribute())
      .optionalAttribute('msg', STRING, 'Message shown when validation fails')
      .build()
  );
  const validator = (subType: string, description: string) =>
    defineType(VALIDATOR, subType).inheritsFrom(VALIDATOR).description(description).factory(createValidator);

  registry.registerType(validator('required', 'Value must be present').build());
  registry.registerType(
    validator('length', 'Text length bounds').optionalAttribute('min', INT).optionalAttribute('max', INT).build()
  );
  registry.registerType(validator('regex', 'Value must match a pattern').requiredAttribute('mask', STRING).build());
  registry.registerType(
    validator('numeric', 'Numeric bounds').optionalAttribute('min', DOUBLE).optionalAttribute('max', DOUBLE).build()
  );
  registry.registerType(
    validator('array', 'Array size bounds')
      .optionalAttribute('minSize', INT)
      .optionalAttribute('maxSize', INT)
      .build()
  );
}

export function registerViewTypes(registry: TypeRegistry): void {
  registry.registerType(
    defineType(VIEW, BASE_SUBTYPE)
      .description('Presentation hint')
      .abstract()
      .factory(createView)
      .child(anyAttribute())
      .optionalAttribute('label', STRING)
      .build()
  );
  const view = (subType: string, description: string) =>
    defineType(VIEW, subType).inheritsFrom(VIEW).description(description).factory(createView);

  registry.registerType(view('text', 'Single line text input').optionalAttribute('size', INT).build());
  registry.registerType(view('textarea', 'Multi line text input').optionalAttribute('rows', INT).build());
  registry.registerType(view('date', 'Date picker').optionalAttribute('format', STRING).build());
  registry.registerType(view('hotlink', 'Link to another object').optionalAttribute('url', STRING).build());
}
