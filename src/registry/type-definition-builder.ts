import { BASE_SUBTYPE, WILDCARD } from '../constants';
import { ConfigurationError } from '../errors';
import { ChildRequirement } from './child-requirement';
import type { TAttributeRequirement, TMetaDataFactory, TTypeDefinition } from './types';

/**
 * Fluent builder for TTypeDefinition
 *
 * @example
 * ```typescript
 * const stringField = defineType('field', 'string')
 *   .inheritsFrom('field', 'base')
 *   .description('Text field')
 *   .optionalAttribute('maxLength', 'int')
 *   .factory((init) => new MetaField(init))
 *   .build();
 * ```
 */
export class TypeDefinitionBuilder {
  private readonly definition: Omit<TTypeDefinition, 'factory'> & { factory?: TMetaDataFactory };

  constructor(type: string, subType: string) {
    this.definition = {
      type,
      subType,
      description: '',
      isAbstract: false,
      childRequirements: [],
      attributeRequirements: {},
    };
  }
  factory(factory: TMetaDataFactory): this {
    this.definition.factory = factory;
    return this;
  }
  inheritsFrom(type: string, subType: string = BASE_SUBTYPE): this {
    this.definition.inheritsFrom = { type, subType };
    return this;
  }
  description(text: string): this {
    this.definition.description = text;
    return this;
  }
  abstract(isAbstract = true): this {
    this.definition.isAbstract = isAbstract;
    return this;
  }
  child(requirement: ChildRequirement): this {
    this.definition.childRequirements.push(requirement);
    return this;
  }
  /** Accept any number of children of the given type */
  acceptsChildren(type: string, subType: string = WILDCARD): this {
    return this.child(ChildRequirement.many(WILDCARD, type, subType));
  }
  requiredChild(name: string, type: string, subType: string = WILDCARD): this {
    return this.child(ChildRequirement.required(name, type, subType));
  }
  optionalAttribute(name: string, subType: string, description?: string): this {
    return this.attribute({ name, subType, required: false, description });
  }
  requiredAttribute(name: string, subType: string, description?: string): this {
    return this.attribute({ name, subType, required: true, description });
  }
  attribute(requirement: TAttributeRequirement): this {
    this.definition.attributeRequirements[requirement.name] = requirement;
    return this;
  }
  /** Build and return the final TTypeDefinition */
  build(): TTypeDefinition {
    const { factory } = this.definition;
    if (!factory) {
      throw new ConfigurationError(
        `Type definition ${this.definition.type}.${this.definition.subType} has no factory`
      );
    }
    return {
      ...this.definition,
      factory,
      childRequirements: [...this.definition.childRequirements],
      attributeRequirements: { ...this.definition.attributeRequirements },
    };
  }
}

export function defineType(type: string, subType: string = BASE_SUBTYPE): TypeDefinitionBuilder {
  return new TypeDefinitionBuilder(type, subType);
}
