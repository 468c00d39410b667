import type { MetaData } from '../model/meta-data';
import type { ChildRequirement } from './child-requirement';
import type { TypeRegistry } from './type-registry';

export interface TTypeKey {
  type: string;
  subType: string;
}

/** Everything a factory needs to construct a node */
export interface TNodeInit {
  type: string;
  subType: string;
  name: string;
  registry: TypeRegistry;
}

export type TMetaDataFactory = (init: TNodeInit) => MetaData;

export interface TAttributeRequirement {
  name: string;
  /** attr subType the value is parsed as */
  subType: string;
  required: boolean;
  description?: string;
}

/**
 * A registered (type, subType) pair as declared by a type-defining module.
 */
export interface TTypeDefinition {
  type: string;
  subType: string;
  factory: TMetaDataFactory;
  inheritsFrom?: TTypeKey;
  description: string;
  /** Abstract definitions only exist to be inherited from */
  isAbstract: boolean;
  childRequirements: ChildRequirement[];
  attributeRequirements: Record<string, TAttributeRequirement>;
}

/**
 * A definition with its inheritance chain folded in, most specific entries
 * winning by name.
 */
export interface TResolvedTypeDefinition extends TTypeDefinition {
  /** Chain from the definition itself up to its root ancestor */
  lineage: TTypeKey[];
}

export interface TRegistryHealthReport {
  typeCount: number;
  definitionCount: number;
  countsByType: Record<string, number>;
  abstractDefinitions: string[];
  definitionsWithoutRequirements: string[];
  frozen: boolean;
}

export function typeKeyToString(key: TTypeKey): string {
  return `${key.type}.${key.subType}`;
}
