/**
 * @module constraint/factories
 *
 * Builders for the common constraint shapes. Every builder takes a target
 * pattern written as `type.subType[.name]`, e.g. `field.string` or
 * `field.*.id`; omitted slots are wildcards.
 */

import { WILDCARD } from '../constants';
import { ConfigurationError } from '../errors';
import type { MetaData } from '../model/meta-data';
import type { PlacementConstraint, TConstraintPredicate, TTargetPattern, ValidationConstraint } from './types';

/**
 * Parse `type.subType.name` into a pattern. Names may contain dots, so
 * everything after the second dot belongs to the name.
 */
export function parseTargetPattern(pattern: string): TTargetPattern {
  const [targetType = WILDCARD, targetSubType = WILDCARD, ...rest] = pattern.split('.');
  if (targetType === '') {
    throw new ConfigurationError(`Invalid constraint target pattern '${pattern}'`);
  }
  return {
    targetType,
    targetSubType: targetSubType || WILDCARD,
    targetName: rest.length > 0 ? rest.join('.') : WILDCARD,
  };
}

export function allowPlacement(
  id: string,
  parent: string,
  child: string,
  description = `${child} allowed under ${parent}`
): PlacementConstraint {
  return placement(id, parent, child, true, description);
}

export function forbidPlacement(
  id: string,
  parent: string,
  child: string,
  description = `${child} not allowed under ${parent}`
): PlacementConstraint {
  return placement(id, parent, child, false, description);
}

function placement(
  id: string,
  parent: string,
  child: string,
  allowed: boolean,
  description: string
): PlacementConstraint {
  const parentPattern = parseTargetPattern(parent);
  return {
    kind: 'placement',
    id,
    description,
    ...parseTargetPattern(child),
    parentType: parentPattern.targetType,
    parentSubType: parentPattern.targetSubType,
    allowed,
  };
}

export interface TValidationOptions {
  /** Validate this attribute of the target instead of its name */
  attributeName?: string;
  description?: string;
  message?: (node: MetaData, value: unknown) => string;
}

export function validationConstraint(
  id: string,
  target: string,
  predicate: TConstraintPredicate,
  options: TValidationOptions = {}
): ValidationConstraint {
  return {
    kind: 'validation',
    id,
    description: options.description ?? id,
    ...parseTargetPattern(target),
    attributeName: options.attributeName,
    predicate,
    message: options.message,
  };
}

/** Value (name or attribute) must fully match `regex` */
export function regexConstraint(
  id: string,
  target: string,
  regex: RegExp,
  options: TValidationOptions = {}
): ValidationConstraint {
  const anchored = new RegExp(`^(?:${regex.source})$`, regex.flags);
  return validationConstraint(id, target, (_node, value) => typeof value === 'string' && anchored.test(value), {
    description: `must match ${regex.source}`,
    ...options,
  });
}

/** Value must be one of `allowed` */
export function enumConstraint(
  id: string,
  target: string,
  allowed: readonly string[],
  options: TValidationOptions = {}
): ValidationConstraint {
  return validationConstraint(id, target, (_node, value) => allowed.some((a) => a === value), {
    description: `must be one of: ${allowed.join(', ')}`,
    ...options,
  });
}

/** Numeric value must lie in [min, max]; either bound may be omitted */
export function rangeConstraint(
  id: string,
  target: string,
  bounds: { min?: number; max?: number },
  options: TValidationOptions = {}
): ValidationConstraint {
  const { min, max } = bounds;
  return validationConstraint(
    id,
    target,
    (_node, value) => {
      const n = typeof value === 'bigint' ? Number(value) : value;
      if (typeof n !== 'number' || Number.isNaN(n)) return false;
      return (min === undefined || n >= min) && (max === undefined || n <= max);
    },
    { description: `must be within [${min ?? '-∞'}, ${max ?? '∞'}]`, ...options }
  );
}

/** String or array length must lie in [min, max] */
export function lengthConstraint(
  id: string,
  target: string,
  bounds: { min?: number; max?: number },
  options: TValidationOptions = {}
): ValidationConstraint {
  const { min, max } = bounds;
  return validationConstraint(
    id,
    target,
    (_node, value) => {
      if (typeof value !== 'string' && !Array.isArray(value)) return false;
      return (min === undefined || value.length >= min) && (max === undefined || value.length <= max);
    },
    { description: `length must be within [${min ?? 0}, ${max ?? '∞'}]`, ...options }
  );
}

/**
 * Fails when the values extracted from a node contain duplicates.
 * `valueDescription` names the values in the violation message.
 */
export function uniquenessConstraint(
  id: string,
  target: string,
  valueDescription: string,
  extract: (node: MetaData, value: unknown) => string[],
  options: TValidationOptions = {}
): ValidationConstraint {
  const duplicatesOf = (values: string[]): string[] =>
    [...new Set(values.filter((v, i) => values.indexOf(v) !== i))].sort();

  return validationConstraint(id, target, (node, value) => duplicatesOf(extract(node, value)).length === 0, {
    description: `${valueDescription} must be unique`,
    message: (node, value) =>
      `Duplicate ${valueDescription} found in ${node.type} '${node.name}': ` +
      duplicatesOf(extract(node, value)).join(', '),
    ...options,
  });
}

/** Entries of an array-valued attribute must be unique */
export function uniqueEntriesConstraint(
  id: string,
  target: string,
  attributeName: string,
  valueDescription = `${attributeName} entries`
): ValidationConstraint {
  return uniquenessConstraint(
    id,
    target,
    valueDescription,
    (_node, value) => (Array.isArray(value) ? value.map((v: unknown) => String(v)) : []),
    { attributeName }
  );
}
