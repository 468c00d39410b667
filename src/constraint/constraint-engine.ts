/**
 * @module constraint/constraint-engine
 *
 * Real-time validation of tree mutations.
 *
 * ## Placement (open world with explicit forbid)
 *
 * ```
 * matching = placement constraints matching (parent) × (child)
 * any forbid in matching   → violation
 * otherwise                → allowed (with or without an allow match)
 * ```
 *
 * ## Validation
 *
 * After placement succeeds every validation constraint matching the child runs
 * against it. Attribute-scoped constraints receive the value of the child's own
 * attribute of that name and are skipped while the attribute is absent.
 */

import { WILDCARD, matchesPattern } from '../constants';
import { ConfigurationError, ConstraintViolationError } from '../errors';
import type { MetaData } from '../model/meta-data';
import { describeNode } from '../path/meta-data-path';
import { getErrorMessage } from '../utils/error-utils';
import { createLogger } from '../utils/logger';
import {
  isPlacementConstraint,
  isValidationConstraint,
  type Constraint,
  type PlacementConstraint,
  type TConstraintEngineStatus,
  type TTargetPattern,
  type ValidationConstraint,
} from './types';

export const SIBLING_UNIQUE_ID = 'sibling.unique';

const log = createLogger('constraints');

function matchesTarget(pattern: TTargetPattern, type: string, subType: string, name: string): boolean {
  return (
    matchesPattern(pattern.targetType, type) &&
    matchesPattern(pattern.targetSubType, subType) &&
    matchesPattern(pattern.targetName, name)
  );
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') return `'${value}'`;
  if (Array.isArray(value) || (typeof value === 'object' && value !== null)) {
    return JSON.stringify(value);
  }
  return String(value);
}

export class ConstraintEngine {
  private readonly constraints = new Map<string, Constraint>();
  // Indexed by target type; wildcard targets live under '*'
  private readonly byTargetType = new Map<string, Constraint[]>();
  private enabled = true;
  private readonly disabledTypes = new Set<string>();

  addConstraint(constraint: Constraint): void {
    if (this.constraints.has(constraint.id)) {
      throw new ConfigurationError(`Constraint '${constraint.id}' is already registered`, {
        constraintId: constraint.id,
      });
    }
    this.constraints.set(constraint.id, constraint);
    const bucketKey = matchesPattern(constraint.targetType, WILDCARD) ? WILDCARD : constraint.targetType;
    const bucket = this.byTargetType.get(bucketKey) ?? [];
    bucket.push(constraint);
    this.byTargetType.set(bucketKey, bucket);
    log.debug(`Registered ${constraint.kind} constraint '${constraint.id}'`);
  }

  addConstraints(constraints: Iterable<Constraint>): void {
    for (const constraint of constraints) {
      this.addConstraint(constraint);
    }
  }

  getConstraint(id: string): Constraint | undefined {
    return this.constraints.get(id);
  }

  /**
   * Every registered constraint in registration order, placement rules
   * included despite the name. Read by the enforcement loop and by schema
   * generators; use {@link getValidationConstraints} for validation only.
   */
  getAllValidationConstraints(): Constraint[] {
    return [...this.constraints.values()];
  }

  getPlacementConstraints(): PlacementConstraint[] {
    return this.getAllValidationConstraints().filter(isPlacementConstraint);
  }

  getValidationConstraints(): ValidationConstraint[] {
    return this.getAllValidationConstraints().filter(isValidationConstraint);
  }

  // ---------------------------------------------------------------------------
  // Switches
  // ---------------------------------------------------------------------------

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
    log.info(`Constraint checking ${enabled ? 'enabled' : 'disabled'} globally`);
  }

  setEnabledForType(type: string, enabled: boolean): void {
    if (enabled) {
      this.disabledTypes.delete(type);
    } else {
      this.disabledTypes.add(type);
    }
    log.info(`Constraint checking ${enabled ? 'enabled' : 'disabled'} for type '${type}'`);
  }

  isEnabledFor(type: string): boolean {
    return this.enabled && !this.disabledTypes.has(type);
  }

  getStatus(): TConstraintEngineStatus {
    const all = this.getAllValidationConstraints();
    return {
      enabled: this.enabled,
      disabledTypes: [...this.disabledTypes].sort(),
      placementCount: all.filter((c) => c.kind === 'placement').length,
      validationCount: all.filter((c) => c.kind === 'validation').length,
    };
  }

  // ---------------------------------------------------------------------------
  // Matching
  // ---------------------------------------------------------------------------

  private candidatesFor(type: string): Constraint[] {
    return [...(this.byTargetType.get(type) ?? []), ...(this.byTargetType.get(WILDCARD) ?? [])];
  }

  findPlacementConstraints(
    parentType: string,
    parentSubType: string,
    childType: string,
    childSubType: string,
    childName: string
  ): PlacementConstraint[] {
    return this.candidatesFor(childType).filter(
      (c): c is PlacementConstraint =>
        c.kind === 'placement' &&
        matchesPattern(c.parentType, parentType) &&
        matchesPattern(c.parentSubType, parentSubType) &&
        matchesTarget(c, childType, childSubType, childName)
    );
  }

  /** Placement decision without a node, for tooling */
  isPlacementAllowed(
    parentType: string,
    parentSubType: string,
    childType: string,
    childSubType: string,
    childName: string = WILDCARD
  ): boolean {
    return !this.findPlacementConstraints(parentType, parentSubType, childType, childSubType, childName).some(
      (c) => !c.allowed
    );
  }

  findValidationConstraints(node: MetaData, attributeName?: string): ValidationConstraint[] {
    return this.candidatesFor(node.type).filter(
      (c): c is ValidationConstraint =>
        c.kind === 'validation' &&
        c.attributeName === attributeName &&
        matchesTarget(c, node.type, node.subType, node.name)
    );
  }

  // ---------------------------------------------------------------------------
  // Enforcement
  // ---------------------------------------------------------------------------

  /**
   * Throws ConstraintViolationError when `child` may not be attached to
   * `parent`. Never mutates either node.
   */
  enforceOnAddChild(parent: MetaData, child: MetaData): void {
    // Sibling uniqueness is structural and stays on when checking is disabled
    if (!child.isAttribute() && parent.findLocalChild(child.type, child.name)) {
      throw new ConstraintViolationError(
        `Duplicate ${child.type} '${child.name}' under ${describeNode(parent)}`,
        SIBLING_UNIQUE_ID,
        child.name,
        describeNode(parent)
      );
    }

    if (!this.isEnabledFor(parent.type) || !this.isEnabledFor(child.type)) {
      return;
    }

    const placements = this.findPlacementConstraints(
      parent.type,
      parent.subType,
      child.type,
      child.subType,
      child.name
    );
    const forbid = placements.find((c) => !c.allowed);
    if (forbid) {
      throw new ConstraintViolationError(
        `Placement of ${child.type}:${child.name}(${child.subType}) under ${describeNode(parent)} ` +
          `is forbidden by '${forbid.id}': ${forbid.description}`,
        forbid.id,
        child.name,
        describeNode(parent)
      );
    }

    for (const constraint of this.findValidationConstraints(child)) {
      this.check(constraint, child, child.name);
    }
    for (const constraint of this.candidatesFor(child.type)) {
      if (constraint.kind !== 'validation' || constraint.attributeName === undefined) continue;
      if (!matchesTarget(constraint, child.type, child.subType, child.name)) continue;
      const attr = child.findLocalAttr(constraint.attributeName);
      const value = attr?.getValue();
      if (value !== undefined) {
        this.check(constraint, child, value);
      }
    }

    if (child.isAttribute()) {
      const value = child.getValue();
      if (value !== undefined) {
        this.enforceOnSetAttribute(parent, child.name, value);
      }
    }
  }

  /**
   * Runs the attribute-scoped constraints of `node` for `attrName`.
   */
  enforceOnSetAttribute(node: MetaData, attrName: string, value: unknown): void {
    if (!this.isEnabledFor(node.type)) {
      return;
    }
    for (const constraint of this.findValidationConstraints(node, attrName)) {
      this.check(constraint, node, value);
    }
  }

  private check(constraint: ValidationConstraint, node: MetaData, value: unknown): void {
    let passed: boolean;
    try {
      passed = constraint.predicate(node, value);
    } catch (error) {
      throw new ConstraintViolationError(
        `Constraint '${constraint.id}' could not be evaluated on ${describeNode(node)}: ${getErrorMessage(error)}`,
        constraint.id,
        value,
        describeNode(node)
      );
    }
    if (!passed) {
      const message =
        constraint.message?.(node, value) ??
        `Constraint '${constraint.id}' violated by ${describeNode(node)}: ${constraint.description} ` +
          `(value: ${formatValue(value)})`;
      throw new ConstraintViolationError(message, constraint.id, value, describeNode(node));
    }
  }
}
