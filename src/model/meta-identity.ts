import { TYPE_NAMES } from '../constants';
import { ConfigurationError } from '../errors';
import { describeNode } from '../path/meta-data-path';
import { MetaData } from './meta-data';
import { MetaField } from './meta-field';

export type TIdentityGeneration = 'increment' | 'uuid' | 'assigned';

export const IDENTITY_GENERATIONS: readonly TIdentityGeneration[] = ['increment', 'uuid', 'assigned'];

/**
 * Primary or secondary key of an object. `fields` names the fields that make
 * up the key; they are resolved against the owning object.
 */
export class MetaIdentity extends MetaData {
  static isMetaIdentity(node: MetaData): node is MetaIdentity {
    return node instanceof MetaIdentity;
  }

  isPrimary(): boolean {
    return this.subType === 'primary';
  }

  getFields(): string[] {
    const fields = this.getAttrValue('fields');
    if (Array.isArray(fields)) return fields;
    return typeof fields === 'string' && fields.length > 0 ? [fields] : [];
  }

  /**
   * The MetaField nodes named by `fields`, looked up on the owning object
   * (inherited fields included).
   */
  getMetaFields(): MetaField[] {
    const owner = this.getParent();
    if (!owner || owner.type !== TYPE_NAMES.OBJECT) {
      throw new ConfigurationError(`Identity ${describeNode(this)} is not declared on an object`);
    }
    return this.getFields().map((name) => {
      const field = owner.findChild(TYPE_NAMES.FIELD, name);
      if (!field || !MetaField.isMetaField(field)) {
        throw new ConfigurationError(
          `Identity ${describeNode(this)} references unknown field '${name}' on ${describeNode(owner)}`
        );
      }
      return field;
    });
  }

  isCompound(): boolean {
    return this.getFields().length > 1;
  }

  isSimple(): boolean {
    return this.getFields().length === 1;
  }

  getGeneration(): TIdentityGeneration {
    const generation = this.getAttrValue('generation');
    return IDENTITY_GENERATIONS.find((g) => g === generation) ?? 'assigned';
  }

  isAutoGenerated(): boolean {
    return this.getGeneration() !== 'assigned';
  }
}
