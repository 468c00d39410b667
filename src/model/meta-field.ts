import { ATTR_SUBTYPES, TYPE_NAMES } from '../constants';
import type { TAttrValue } from './attr-codecs';
import { MetaData } from './meta-data';
import { MetaValidator } from './meta-validator';
import { MetaView } from './meta-view';

export class MetaField extends MetaData {
  static isMetaField(node: MetaData): node is MetaField {
    return node instanceof MetaField;
  }

  /** The field's data type is its subType: `string`, `long`, `date`, ... */
  getDataType(): string {
    return this.subType;
  }

  isArray(): boolean {
    return this.subType === ATTR_SUBTYPES.STRING_ARRAY || this.getAttrValue('isArray') === true;
  }

  isRequired(): boolean {
    return (
      this.getAttrValue('required') === true ||
      this.getValidators().some((v) => v.getValidatorType() === 'required')
    );
  }

  getDefaultValue(): TAttrValue | undefined {
    return this.getAttrValue('defaultValue');
  }

  getDescription(): string | undefined {
    const description = this.getAttrValue('description');
    return typeof description === 'string' ? description : undefined;
  }

  /** Referenced object name for `object` fields */
  getObjectRef(): string | undefined {
    const ref = this.getAttrValue('objectRef');
    return typeof ref === 'string' ? ref : undefined;
  }

  getValidators(): MetaValidator[] {
    return this.getChildrenOfType(TYPE_NAMES.VALIDATOR, MetaValidator.isMetaValidator);
  }

  getViews(): MetaView[] {
    return this.getChildrenOfType(TYPE_NAMES.VIEW, MetaView.isMetaView);
  }

  /** The object this field is declared on, if any */
  getDeclaringObject(): MetaData | undefined {
    const parent = this.getParent();
    return parent?.type === TYPE_NAMES.OBJECT ? parent : undefined;
  }
}
