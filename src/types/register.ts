/**
 * Explicit, ordered registration of the built-in types. Each step may only
 * inherit from types registered by an earlier step.
 */

import type { TypeRegistry } from '../registry/type-registry';
import { createCoreConstraints } from './core-constraints';
import { registerFieldTypes } from './field-types';
import { registerLoaderType } from './loader-type';
import { registerAttributeTypes, registerMetaDataTypes } from './metadata-types';
import { registerIdentityTypes, registerObjectTypes, registerRelationshipTypes } from './object-types';
import { registerValidatorTypes, registerViewTypes } from './presentation-types';

export type TTypeModule = (registry: TypeRegistry) => void;

export const CORE_TYPE_MODULES: readonly TTypeModule[] = [
  registerMetaDataTypes,
  registerLoaderType,
  registerAttributeTypes,
  registerFieldTypes,
  registerObjectTypes,
  registerIdentityTypes,
  registerRelationshipTypes,
  registerValidatorTypes,
  registerViewTypes,
];

export function registerCoreTypes(registry: TypeRegistry): void {
  for (const register of CORE_TYPE_MODULES) {
    register(registry);
  }
  for (const constraint of createCoreConstraints()) {
    registry.addConstraint(constraint);
  }
}
