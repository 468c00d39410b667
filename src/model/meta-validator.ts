import { MetaData } from './meta-data';

/**
 * Declarative validation rule attached to a field. The engine only carries
 * the rule; consumers apply it to data.
 */
export class MetaValidator extends MetaData {
  static isMetaValidator(node: MetaData): node is MetaValidator {
    return node instanceof MetaValidator;
  }

  getValidatorType(): string {
    return this.subType;
  }

  getMessage(): string | undefined {
    const msg = this.getAttrValue('msg');
    return typeof msg === 'string' ? msg : undefined;
  }
}
