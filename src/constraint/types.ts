import type { MetaData } from '../model/meta-data';

/**
 * Pattern a constraint applies to. Each slot is `"*"` or an exact value.
 */
export interface TTargetPattern {
  targetType: string;
  targetSubType: string;
  targetName: string;
}

interface TConstraintBase extends TTargetPattern {
  id: string;
  description: string;
}

/**
 * Allows or forbids attaching children matching the target pattern under
 * parents matching the parent pattern. A matching forbid always wins.
 */
export interface PlacementConstraint extends TConstraintBase {
  kind: 'placement';
  parentType: string;
  parentSubType: string;
  allowed: boolean;
}

export type TConstraintPredicate = (node: MetaData, value: unknown) => boolean;

/**
 * Predicate run against nodes matching the target pattern once placement
 * succeeded. With `attributeName` set the constraint is attribute-scoped and
 * receives the value of that attribute.
 */
export interface ValidationConstraint extends TConstraintBase {
  kind: 'validation';
  attributeName?: string;
  predicate: TConstraintPredicate;
  /** Custom violation message; defaults to the description */
  message?: (node: MetaData, value: unknown) => string;
}

export type Constraint = PlacementConstraint | ValidationConstraint;

export interface TConstraintEngineStatus {
  enabled: boolean;
  disabledTypes: string[];
  placementCount: number;
  validationCount: number;
}

export function isPlacementConstraint(constraint: Constraint): constraint is PlacementConstraint {
  return constraint.kind === 'placement';
}

export function isValidationConstraint(constraint: Constraint): constraint is ValidationConstraint {
  return constraint.kind === 'validation';
}
