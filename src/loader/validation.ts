/**
 * Whole-tree checks run once loading finishes. Constraint checks already ran
 * on every mutation; these cover what can only be known at the end: required
 * attributes and children, identity field references and relationship
 * targets.
 */

import { TYPE_NAMES } from '../constants';
import { ConfigurationError } from '../errors';
import type { MetaData } from '../model/meta-data';
import { MetaField } from '../model/meta-field';
import { MetaIdentity } from '../model/meta-identity';
import { MetaRelationship } from '../model/meta-relationship';
import { describeNode } from '../path/meta-data-path';

export type TValidationIssue = {
  type: 'error' | 'warning';
  code: string;
  message: string;
  /** Path of the offending node */
  node?: string;
};

export interface ValidationResult {
  valid: boolean;
  errors: TValidationIssue[];
  warnings: TValidationIssue[];
}

function* walk(node: MetaData): Generator<MetaData> {
  for (const child of node.getChildren(undefined, false)) {
    if (child.isAttribute()) continue;
    yield child;
    yield* walk(child);
  }
}

export function validateTree(root: MetaData): ValidationResult {
  const registry = root.getRegistry();
  const errors: TValidationIssue[] = [];
  const warnings: TValidationIssue[] = [];

  for (const node of walk(root)) {
    for (const missing of registry.getMissingRequirements(node)) {
      errors.push({
        type: 'error',
        code: 'MISSING_REQUIREMENT',
        message: `${describeNode(node)} is missing required ${missing}`,
        node: describeNode(node),
      });
    }

    if (MetaIdentity.isMetaIdentity(node)) {
      try {
        node.getMetaFields();
      } catch (error) {
        if (!ConfigurationError.isConfigurationError(error)) throw error;
        errors.push({ type: 'error', code: 'UNKNOWN_IDENTITY_FIELD', message: error.message, node: describeNode(node) });
      }
    }

    if (MetaRelationship.isMetaRelationship(node) && node.getTargetObject() && !node.findTargetObjectNode()) {
      errors.push({
        type: 'error',
        code: 'UNKNOWN_TARGET_OBJECT',
        message: `${describeNode(node)} targets unknown object '${node.getTargetObject()}'`,
        node: describeNode(node),
      });
    }

    if (MetaField.isMetaField(node) && node.subType === TYPE_NAMES.OBJECT) {
      const ref = node.getObjectRef();
      if (!ref) {
        warnings.push({
          type: 'warning',
          code: 'MISSING_OBJECT_REF',
          message: `${describeNode(node)} does not name the object it holds`,
          node: describeNode(node),
        });
      }
    }
  }

  return { valid: errors.length === 0, errors, warnings };
}
