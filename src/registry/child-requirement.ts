import { WILDCARD, isWildcard, matchesPattern } from '../constants';

export type TCardinality = 'one' | 'many' | 'optional';

/**
 * A rule describing which child (type, subType, name) a parent definition
 * accepts. Any slot may be the `"*"` wildcard.
 *
 * @example
 * ```typescript
 * ChildRequirement.many('*', 'field', '*');          // any number of fields
 * ChildRequirement.required('fields', 'attr', 'stringArray');
 * ```
 */
export class ChildRequirement {
  constructor(
    public readonly name: string,
    public readonly expectedType: string,
    public readonly expectedSubType: string = WILDCARD,
    public readonly cardinality: TCardinality = 'optional'
  ) {}

  static optional(name: string, type: string, subType: string = WILDCARD): ChildRequirement {
    return new ChildRequirement(name, type, subType, 'optional');
  }

  static required(name: string, type: string, subType: string = WILDCARD): ChildRequirement {
    return new ChildRequirement(name, type, subType, 'one');
  }

  static many(name: string, type: string, subType: string = WILDCARD): ChildRequirement {
    return new ChildRequirement(name, type, subType, 'many');
  }

  get isRequired(): boolean {
    return this.cardinality === 'one';
  }

  get isWildcardName(): boolean {
    return isWildcard(this.name);
  }

  /**
   * Key used when merging inherited requirements. Named requirements override
   * by name; wildcard-named ones by their type pattern.
   */
  get mergeKey(): string {
    return this.isWildcardName ? `${this.expectedType}.${this.expectedSubType}.${WILDCARD}` : this.name;
  }

  matches(type: string, subType: string, name: string): boolean {
    return (
      matchesPattern(this.expectedType, type) &&
      matchesPattern(this.expectedSubType, subType) &&
      matchesPattern(this.name, name)
    );
  }

  toString(): string {
    return `${this.expectedType}.${this.expectedSubType}[${this.name}] (${this.cardinality})`;
  }
}
