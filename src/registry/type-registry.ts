/**
 * @module registry/type-registry
 *
 * Store of (type, subType) definitions.
 *
 * ## Lifecycle
 *
 * ```
 * construct → register-all → freeze() → read-many
 * ```
 *
 * Registration is idempotent per pair as long as the factory is the same.
 * Inheritance is resolved by walking `inheritsFrom` to the root and folding
 * requirements from the most general definition to the most specific one.
 * The folded result is cached per pair and the cache is dropped on every
 * registration.
 */

import { ConstraintEngine } from '../constraint/constraint-engine';
import type { Constraint } from '../constraint/types';
import { WILDCARD } from '../constants';
import { ConfigurationError, UnknownTypeError } from '../errors';
import type { MetaData } from '../model/meta-data';
import { findClosestMatches } from '../utils/string-distance';
import { createLogger } from '../utils/logger';
import type { ChildRequirement } from './child-requirement';
import {
  typeKeyToString,
  type TAttributeRequirement,
  type TRegistryHealthReport,
  type TResolvedTypeDefinition,
  type TTypeDefinition,
  type TTypeKey,
} from './types';

const log = createLogger('registry');

export class TypeRegistry {
  readonly constraints: ConstraintEngine;

  private readonly definitions = new Map<string, TTypeDefinition>();
  private readonly resolved = new Map<string, TResolvedTypeDefinition>();
  private frozen = false;
  private initializing = false;

  constructor(constraints: ConstraintEngine = new ConstraintEngine()) {
    this.constraints = constraints;
  }

  // ---------------------------------------------------------------------------
  // Registration
  // ---------------------------------------------------------------------------

  /**
   * Run a batch of registrations under the initialization lock.
   * Nested batches are rejected.
   */
  initialize(register: (registry: TypeRegistry) => void): this {
    if (this.initializing) {
      throw new ConfigurationError('Type registration is already in progress');
    }
    this.assertNotFrozen();
    this.initializing = true;
    try {
      register(this);
    } finally {
      this.initializing = false;
    }
    return this;
  }

  registerType(definition: TTypeDefinition): void {
    this.assertNotFrozen();
    const key = typeKeyToString(definition);
    const existing = this.definitions.get(key);
    if (existing && existing.factory !== definition.factory) {
      throw new ConfigurationError(`Type ${key} is already registered with a different factory`, {
        type: definition.type,
        subType: definition.subType,
      });
    }

    if (definition.inheritsFrom) {
      const parentKey = typeKeyToString(definition.inheritsFrom);
      if (!this.definitions.has(parentKey)) {
        throw new ConfigurationError(`Type ${key} inherits from unregistered type ${parentKey}`, {
          type: definition.type,
          subType: definition.subType,
        });
      }
      this.assertNoCycle(key, definition.inheritsFrom);
    }

    this.definitions.set(key, definition);
    this.resolved.clear();
    log.debug(`${existing ? 'Re-registered' : 'Registered'} type ${key}`);
  }

  private assertNoCycle(key: string, parent: TTypeKey): void {
    const visited = new Set<string>([key]);
    let current: TTypeKey | undefined = parent;
    while (current) {
      const currentKey = typeKeyToString(current);
      if (visited.has(currentKey)) {
        throw new ConfigurationError(
          `Cyclic inheritance: ${[...visited, currentKey].join(' → ')}`,
          { type: key }
        );
      }
      visited.add(currentKey);
      current = this.definitions.get(currentKey)?.inheritsFrom;
    }
  }

  freeze(): void {
    this.frozen = true;
    log.debug(`Registry frozen with ${this.definitions.size} definitions`);
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  private assertNotFrozen(): void {
    if (this.frozen) {
      throw new ConfigurationError('Type registry is frozen; register types before freeze()');
    }
  }

  addConstraint(constraint: Constraint): void {
    this.assertNotFrozen();
    this.constraints.addConstraint(constraint);
  }

  getAllValidationConstraints(): Constraint[] {
    return this.constraints.getAllValidationConstraints();
  }

  // ---------------------------------------------------------------------------
  // Lookup
  // ---------------------------------------------------------------------------

  hasType(type: string, subType?: string): boolean {
    if (subType === undefined || subType === WILDCARD) {
      return [...this.definitions.values()].some((d) => d.type === type);
    }
    return this.definitions.has(typeKeyToString({ type, subType }));
  }

  /** Fully merged definition, or undefined when the pair is unregistered */
  getTypeDefinition(type: string, subType: string): TResolvedTypeDefinition | undefined {
    const key = typeKeyToString({ type, subType });
    const cached = this.resolved.get(key);
    if (cached) return cached;

    const own = this.definitions.get(key);
    if (!own) return undefined;

    const chain: TTypeDefinition[] = [];
    for (let d: TTypeDefinition | undefined = own; d; ) {
      chain.push(d);
      d = d.inheritsFrom ? this.definitions.get(typeKeyToString(d.inheritsFrom)) : undefined;
    }

    const children = new Map<string, ChildRequirement>();
    const attributes: Record<string, TAttributeRequirement> = {};
    for (const d of [...chain].reverse()) {
      for (const requirement of d.childRequirements) {
        children.set(requirement.mergeKey, requirement);
      }
      Object.assign(attributes, d.attributeRequirements);
    }

    const merged: TResolvedTypeDefinition = {
      ...own,
      description: own.description || chain.find((d) => d.description)?.description || '',
      childRequirements: [...children.values()],
      attributeRequirements: attributes,
      lineage: chain.map((d) => ({ type: d.type, subType: d.subType })),
    };
    this.resolved.set(key, merged);
    return merged;
  }

  requireTypeDefinition(type: string, subType: string): TResolvedTypeDefinition {
    const definition = this.getTypeDefinition(type, subType);
    if (!definition) {
      throw new UnknownTypeError(type, subType, this.suggestTypes(type, subType));
    }
    return definition;
  }

  /**
   * Close matches for a misspelled type, or for the subType when the type
   * itself exists.
   */
  suggestTypes(type: string, subType?: string): string[] {
    if (!this.hasType(type)) {
      const types = new Set([...this.definitions.values()].map((d) => d.type));
      return findClosestMatches(type, types);
    }
    if (subType === undefined) return [];
    return findClosestMatches(`${type}.${subType}`, this.definitions.keys());
  }

  /**
   * Construct a node through the registered factory. This is the single gate
   * deciding whether a type exists.
   */
  createInstance(type: string, subType: string, name: string): MetaData {
    const definition = this.requireTypeDefinition(type, subType);
    if (definition.isAbstract) {
      throw new ConfigurationError(`Type ${type}.${subType} is abstract and cannot be instantiated`, {
        type,
        subType,
      });
    }
    const node = definition.factory({ type, subType, name, registry: this });
    if (node.type !== type || node.subType !== subType || node.name !== name) {
      throw new ConfigurationError(
        `Factory for ${type}.${subType} produced ${node.type}.${node.subType} '${node.name}'`
      );
    }
    return node;
  }

  getRegisteredTypes(): TTypeKey[] {
    return [...this.definitions.values()].map((d) => ({ type: d.type, subType: d.subType }));
  }

  getSubTypes(type: string): string[] {
    return [...this.definitions.values()].filter((d) => d.type === type).map((d) => d.subType);
  }

  // ---------------------------------------------------------------------------
  // Child requirements
  // ---------------------------------------------------------------------------

  findChildRequirement(
    parentType: string,
    parentSubType: string,
    childType: string,
    childSubType: string,
    childName: string
  ): ChildRequirement | undefined {
    const definition = this.getTypeDefinition(parentType, parentSubType);
    if (!definition) return undefined;
    // A named requirement is more specific than a wildcard one
    const matching = definition.childRequirements.filter((r) => r.matches(childType, childSubType, childName));
    return matching.find((r) => !r.isWildcardName) ?? matching[0];
  }

  /**
   * Whether the parent definition declares a requirement accepting the child
   * and no placement constraint forbids it.
   */
  acceptsChild(
    parentType: string,
    parentSubType: string,
    childType: string,
    childSubType: string,
    childName: string = WILDCARD
  ): boolean {
    return (
      this.findChildRequirement(parentType, parentSubType, childType, childSubType, childName) !== undefined &&
      this.constraints.isPlacementAllowed(parentType, parentSubType, childType, childSubType, childName)
    );
  }

  getSupportedChildrenDescription(type: string, subType: string): string {
    const definition = this.requireTypeDefinition(type, subType);
    const lines = definition.childRequirements.map((r) => `  ${r.toString()}`);
    const attrs = Object.values(definition.attributeRequirements).map(
      (a) => `  @${a.name}: ${a.subType}${a.required ? ' (required)' : ''}`
    );
    return [`${type}.${subType} accepts:`, ...lines, ...attrs].join('\n');
  }

  /**
   * Required child and attribute requirements `node` does not satisfy, as
   * human-readable descriptions.
   */
  getMissingRequirements(node: MetaData): string[] {
    const definition = this.requireTypeDefinition(node.type, node.subType);
    const missing: string[] = [];
    for (const requirement of definition.childRequirements) {
      if (!requirement.isRequired) continue;
      const satisfied = node
        .getChildren(requirement.expectedType)
        .some((c) => requirement.matches(c.type, c.subType, c.name));
      if (!satisfied) missing.push(`child ${requirement.toString()}`);
    }
    for (const attr of Object.values(definition.attributeRequirements)) {
      if (attr.required && !node.hasAttr(attr.name)) {
        missing.push(`attribute '${attr.name}' (${attr.subType})`);
      }
    }
    return missing;
  }

  getHealthReport(): TRegistryHealthReport {
    const countsByType: Record<string, number> = {};
    const abstractDefinitions: string[] = [];
    const definitionsWithoutRequirements: string[] = [];
    for (const definition of this.definitions.values()) {
      countsByType[definition.type] = (countsByType[definition.type] ?? 0) + 1;
      const key = typeKeyToString(definition);
      if (definition.isAbstract) abstractDefinitions.push(key);
      const resolved = this.getTypeDefinition(definition.type, definition.subType);
      if (
        resolved &&
        resolved.childRequirements.length === 0 &&
        Object.keys(resolved.attributeRequirements).length === 0
      ) {
        definitionsWithoutRequirements.push(key);
      }
    }
    return {
      typeCount: Object.keys(countsByType).length,
      definitionCount: this.definitions.size,
      countsByType,
      abstractDefinitions,
      definitionsWithoutRequirements,
      frozen: this.frozen,
    };
  }
}
