import { TYPE_NAMES } from '../constants';
import { NotFoundError } from '../errors';
import { describeNode } from '../path/meta-data-path';
import { MetaData } from './meta-data';
import { MetaField } from './meta-field';
import { MetaIdentity } from './meta-identity';
import { MetaRelationship } from './meta-relationship';

/**
 * A structured type made of fields, identities and relationships. Everything
 * declared on the super object is visible unless redeclared locally.
 */
export class MetaObject extends MetaData {
  static isMetaObject(node: MetaData): node is MetaObject {
    return node instanceof MetaObject;
  }

  getSuperObject(): MetaObject | undefined {
    const superData = this.getSuperData();
    return superData && MetaObject.isMetaObject(superData) ? superData : undefined;
  }

  /** Own fields first, then inherited ones not redeclared here */
  getMetaFields(): MetaField[] {
    return this.getChildrenOfType(TYPE_NAMES.FIELD, MetaField.isMetaField);
  }

  getMetaField(name: string): MetaField {
    const field = this.getChild(TYPE_NAMES.FIELD, name);
    if (!MetaField.isMetaField(field)) {
      throw new NotFoundError(TYPE_NAMES.FIELD, name, describeNode(this));
    }
    return field;
  }

  hasMetaField(name: string): boolean {
    return this.hasChild(TYPE_NAMES.FIELD, name);
  }

  getIdentities(): MetaIdentity[] {
    return this.getChildrenOfType(TYPE_NAMES.IDENTITY, MetaIdentity.isMetaIdentity);
  }

  getPrimaryIdentity(): MetaIdentity | undefined {
    return this.getIdentities().find((i) => i.isPrimary());
  }

  getSecondaryIdentities(): MetaIdentity[] {
    return this.getIdentities().filter((i) => !i.isPrimary());
  }

  getRelationships(): MetaRelationship[] {
    return this.getChildrenOfType(TYPE_NAMES.RELATIONSHIP, MetaRelationship.isMetaRelationship);
  }

  /** Declared on this object only; subclasses of an abstract object are concrete */
  isAbstract(): boolean {
    return this.findLocalAttr('isAbstract')?.getValue() === true;
  }

  isInterface(): boolean {
    return this.getAttrValue('isInterface') === true;
  }

  getImplements(): string[] {
    const value = this.getAttrValue('implements');
    return Array.isArray(value) ? value : [];
  }
}
