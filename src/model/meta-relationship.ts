import { PKG_SEPARATOR, TYPE_NAMES } from '../constants';
import { MetaData } from './meta-data';

export type TRelationshipCardinality = 'one' | 'many';
export type TRelationshipLifecycle = 'dependent' | 'independent' | 'shared';

const LIFECYCLES: Record<string, TRelationshipLifecycle> = {
  composition: 'dependent',
  aggregation: 'shared',
  association: 'independent',
};

/**
 * Link from an object to another object. The subType carries the semantics:
 * composition owns its target, aggregation shares it, association only refers.
 */
export class MetaRelationship extends MetaData {
  static isMetaRelationship(node: MetaData): node is MetaRelationship {
    return node instanceof MetaRelationship;
  }

  getTargetObject(): string | undefined {
    const target = this.getAttrValue('targetObject');
    return typeof target === 'string' ? target : undefined;
  }

  getCardinality(): TRelationshipCardinality {
    return this.getAttrValue('cardinality') === 'many' ? 'many' : 'one';
  }

  getReferencedBy(): string | undefined {
    const ref = this.getAttrValue('referencedBy');
    return typeof ref === 'string' ? ref : undefined;
  }

  isOneToMany(): boolean {
    return this.getCardinality() === 'many';
  }

  isOwning(): boolean {
    return this.subType === 'composition';
  }

  getLifecycle(): TRelationshipLifecycle {
    return LIFECYCLES[this.subType] ?? 'independent';
  }

  /**
   * Resolve the target among the tree's top-level objects. Unqualified names
   * are looked up in the owning object's package first.
   */
  findTargetObjectNode(): MetaData | undefined {
    const target = this.getTargetObject();
    if (!target) return undefined;
    const root = this.getRoot();
    const pkg = this.getParent()?.getPackage() ?? '';
    if (!target.includes(PKG_SEPARATOR) && pkg) {
      const qualified = root.findChild(TYPE_NAMES.OBJECT, `${pkg}${PKG_SEPARATOR}${target}`);
      if (qualified) return qualified;
    }
    return root.findChild(TYPE_NAMES.OBJECT, target);
  }
}
