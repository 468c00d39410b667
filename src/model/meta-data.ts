/**
 * @module model/meta-data
 *
 * The node of a metadata tree.
 *
 * ## Ownership
 *
 * - `children` are owned exclusively; a node has at most one parent.
 * - `parent` and `superData` are plain back-references, never owners.
 * - A node is attached only through `addChild`, which asks the registry's
 *   constraint engine first and mutates nothing when that throws.
 *
 * ## Inheritance
 *
 * Lookups fall back to `superData` when the node itself has no match.
 * Attributes whose name starts with `_` stay private to the node that
 * declares them.
 */

import { PKG_SEPARATOR, PRIVATE_ATTR_PREFIX, TYPE_NAMES } from '../constants';
import { ConfigurationError, NotFoundError } from '../errors';
import { describeNode } from '../path/meta-data-path';
import type { TypeRegistry } from '../registry/type-registry';
import type { TNodeInit, TResolvedTypeDefinition } from '../registry/types';
import type { TAttrValue } from './attr-codecs';
import type { MetaAttribute } from './meta-attribute';

export class MetaData {
  readonly type: string;
  readonly subType: string;
  readonly name: string;

  private readonly registry: TypeRegistry;
  private parent: MetaData | undefined;
  private superData: MetaData | undefined;
  private readonly children: MetaData[] = [];
  private attrIndex: Map<string, MetaAttribute> | undefined;
  private final = false;
  private sourceName: string | undefined;

  constructor(init: TNodeInit) {
    this.type = init.type;
    this.subType = init.subType;
    this.name = init.name;
    this.registry = init.registry;
  }

  // ---------------------------------------------------------------------------
  // Identity
  // ---------------------------------------------------------------------------

  /** Name without its package: `acme::model::User` → `User` */
  getShortName(): string {
    const idx = this.name.lastIndexOf(PKG_SEPARATOR);
    return idx < 0 ? this.name : this.name.substring(idx + PKG_SEPARATOR.length);
  }

  /** Package part of the name, or '' for simple names */
  getPackage(): string {
    const idx = this.name.lastIndexOf(PKG_SEPARATOR);
    return idx < 0 ? '' : this.name.substring(0, idx);
  }

  getRegistry(): TypeRegistry {
    return this.registry;
  }

  getTypeDefinition(): TResolvedTypeDefinition {
    return this.registry.requireTypeDefinition(this.type, this.subType);
  }

  isAttribute(): this is MetaAttribute {
    return false;
  }

  /** Document the node was declared in, when loaded from one */
  getSourceName(): string | undefined {
    return this.sourceName ?? this.superData?.getSourceName();
  }

  setSourceName(sourceName: string): void {
    this.sourceName = sourceName;
  }

  // ---------------------------------------------------------------------------
  // Structure
  // ---------------------------------------------------------------------------

  getParent(): MetaData | undefined {
    return this.parent;
  }

  getRoot(): MetaData {
    let node: MetaData = this;
    while (node.parent) {
      node = node.parent;
    }
    return node;
  }

  getSuperData(): MetaData | undefined {
    return this.superData;
  }

  setSuperData(superData: MetaData | undefined): void {
    this.assertMutable();
    if (superData) {
      if (superData.type !== this.type) {
        throw new ConfigurationError(
          `Super of ${describeNode(this)} must be of type '${this.type}', got '${superData.type}'`
        );
      }
      for (let s: MetaData | undefined = superData; s; s = s.superData) {
        if (s === this) {
          throw new ConfigurationError(`Circular super reference on ${describeNode(this)}`);
        }
      }
    }
    this.superData = superData;
    this.invalidate();
  }

  /** True once the owning tree has been finalized */
  isFinal(): boolean {
    return this.getRoot().final;
  }

  protected markFinal(final: boolean): void {
    this.final = final;
  }

  private assertMutable(): void {
    if (this.isFinal()) {
      throw new ConfigurationError(`Cannot modify ${describeNode(this)}: the tree is final`);
    }
  }

  private invalidate(): void {
    this.attrIndex = undefined;
  }

  /**
   * Attach `child` after the constraint engine accepted it. An attribute
   * replaces a same-named attribute already on this node.
   */
  addChild(child: MetaData): void {
    this.assertMutable();
    if (child === this || child.parent) {
      throw new ConfigurationError(
        `Cannot add ${describeNode(child)} to ${describeNode(this)}: node is already attached`
      );
    }
    if (child.type === this.type) {
      throw new ConfigurationError(
        `Cannot nest ${child.type} '${child.name}' inside ${describeNode(this)}`
      );
    }

    this.registry.constraints.enforceOnAddChild(this, child);

    const existing = child.isAttribute() ? this.findLocalAttr(child.name) : undefined;
    if (existing) {
      this.children.splice(this.children.indexOf(existing), 1, child);
      existing.parent = undefined;
    } else {
      this.children.push(child);
    }
    child.parent = this;
    this.invalidate();
  }

  /**
   * Children in declaration order. With `includeInherited`, children of the
   * super chain that are not shadowed by a local (type, name) follow.
   */
  getChildren(type?: string, includeInherited = true): MetaData[] {
    const local = type ? this.children.filter((c) => c.type === type) : [...this.children];
    if (!includeInherited || !this.superData) {
      return local;
    }
    const seen = new Set(local.map((c) => `${c.type}:${c.name}`));
    const inherited = this.superData
      .getChildren(type, true)
      .filter((c) => !seen.has(`${c.type}:${c.name}`) && !isPrivateAttr(c));
    return [...local, ...inherited];
  }

  /** Children of `type` narrowed by `guard`, inherited ones included */
  getChildrenOfType<T extends MetaData>(type: string, guard: (node: MetaData) => node is T): T[] {
    return this.getChildren(type).filter(guard);
  }

  findLocalChild(type: string, name: string): MetaData | undefined {
    return this.children.find((c) => c.type === type && c.name === name);
  }

  /**
   * Exact lookup among direct children, falling back to the super chain.
   * Throws NotFoundError on a miss.
   */
  getChild(type: string, name: string): MetaData {
    const local = this.findLocalChild(type, name);
    if (local) return local;
    if (this.superData) {
      const inherited = this.superData.findChild(type, name);
      if (inherited && !isPrivateAttr(inherited)) return inherited;
    }
    throw new NotFoundError(type, name, describeNode(this));
  }

  hasChild(type: string, name: string): boolean {
    return this.findChild(type, name) !== undefined;
  }

  findChild(type: string, name: string): MetaData | undefined {
    try {
      return this.getChild(type, name);
    } catch (error) {
      if (NotFoundError.isNotFoundError(error)) return undefined;
      throw error;
    }
  }

  // ---------------------------------------------------------------------------
  // Attributes
  // ---------------------------------------------------------------------------

  private getAttrIndex(): Map<string, MetaAttribute> {
    if (!this.attrIndex) {
      const index = new Map<string, MetaAttribute>();
      for (const child of this.children) {
        if (child.isAttribute()) index.set(child.name, child);
      }
      this.attrIndex = index;
    }
    return this.attrIndex;
  }

  findLocalAttr(name: string): MetaAttribute | undefined {
    return this.getAttrIndex().get(name);
  }

  /** Attribute by name, inherited through super. Throws NotFoundError. */
  getAttr(name: string): MetaAttribute {
    const local = this.findLocalAttr(name);
    if (local) return local;
    if (this.superData && !name.startsWith(PRIVATE_ATTR_PREFIX)) {
      const inherited = this.superData.findAttr(name);
      if (inherited) return inherited;
    }
    throw new NotFoundError(TYPE_NAMES.ATTR, name, describeNode(this));
  }

  findAttr(name: string): MetaAttribute | undefined {
    try {
      return this.getAttr(name);
    } catch (error) {
      if (NotFoundError.isNotFoundError(error)) return undefined;
      throw error;
    }
  }

  hasAttr(name: string): boolean {
    return this.findAttr(name) !== undefined;
  }

  getAttrValue(name: string): TAttrValue | undefined {
    return this.findAttr(name)?.getValue();
  }

  getAttrs(): MetaAttribute[] {
    return this.getChildren(TYPE_NAMES.ATTR).filter((c): c is MetaAttribute => c.isAttribute());
  }

  // ---------------------------------------------------------------------------
  // Overlay
  // ---------------------------------------------------------------------------

  /**
   * A fresh detached node of the same type/subType/name whose super is this
   * node. The caller attaches it where the overlay happens; this node is
   * left untouched.
   */
  overload(): MetaData {
    const copy = this.registry.createInstance(this.type, this.subType, this.name);
    copy.superData = this;
    if (this.sourceName) copy.sourceName = this.sourceName;
    return copy;
  }

  toString(): string {
    return describeNode(this);
  }
}

function isPrivateAttr(node: MetaData): boolean {
  return node.isAttribute() && node.name.startsWith(PRIVATE_ATTR_PREFIX);
}
