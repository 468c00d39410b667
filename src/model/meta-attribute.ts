import { ConfigurationError } from '../errors';
import { describeNode } from '../path/meta-data-path';
import type { TNodeInit } from '../registry/types';
import { getAttrCodec, type TAttrValue } from './attr-codecs';
import { MetaData } from './meta-data';

export type { TAttrValue } from './attr-codecs';

/**
 * A named, typed scalar attached to another node. The subType decides how
 * document text is parsed (`int` → number, `long` → bigint, ...).
 */
export class MetaAttribute extends MetaData {
  private value: TAttrValue | undefined;

  constructor(init: TNodeInit) {
    super(init);
  }

  static isMetaAttribute(node: MetaData): node is MetaAttribute {
    return node instanceof MetaAttribute;
  }

  override isAttribute(): this is MetaAttribute {
    return true;
  }

  getValue(): TAttrValue | undefined {
    return this.value;
  }

  /**
   * Set the value. When attached, the owner's attribute constraints run first
   * and the value is left unchanged if they fail.
   */
  setValue(value: TAttrValue): void {
    if (this.isFinal()) {
      throw new ConfigurationError(`Cannot modify ${describeNode(this)}: the tree is final`);
    }
    const coerced = getAttrCodec(this.subType).coerce(value);
    const owner = this.getParent();
    if (owner) {
      this.getRegistry().constraints.enforceOnSetAttribute(owner, this.name, coerced);
    }
    this.value = coerced;
  }

  setValueAsString(text: string): void {
    this.setValue(getAttrCodec(this.subType).parse(text));
  }

  getValueAsString(): string | undefined {
    return this.value === undefined ? undefined : getAttrCodec(this.subType).format(this.value);
  }

  isArray(): boolean {
    return Array.isArray(this.value);
  }
}
