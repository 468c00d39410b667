/**
 * Metadata modeling engine: a registry of (type, subType) definitions, a
 * constraint engine guarding every tree mutation, and loaders that merge
 * XML/JSON documents into a typed, inheritable tree.
 */

// Context
export { createMetaDataContext } from './context';
export type { TMetaDataContext, TMetaDataContextOptions } from './context';

// Constants & errors
export * from './constants';
export {
  MetaDataError,
  ConfigurationError,
  UnknownTypeError,
  DocumentParseError,
  ConstraintViolationError,
  NotFoundError,
  formatError,
} from './errors';
export type { TErrorCode, TErrorContext } from './errors';

// Registry
export { TypeRegistry } from './registry/type-registry';
export { ChildRequirement } from './registry/child-requirement';
export type { TCardinality } from './registry/child-requirement';
export { TypeDefinitionBuilder, defineType } from './registry/type-definition-builder';
export { typeKeyToString } from './registry/types';
export type {
  TTypeKey,
  TNodeInit,
  TMetaDataFactory,
  TAttributeRequirement,
  TTypeDefinition,
  TResolvedTypeDefinition,
  TRegistryHealthReport,
} from './registry/types';

// Constraints
export { ConstraintEngine, SIBLING_UNIQUE_ID } from './constraint/constraint-engine';
export * from './constraint/factories';
export { isPlacementConstraint, isValidationConstraint } from './constraint/types';
export type {
  Constraint,
  PlacementConstraint,
  ValidationConstraint,
  TConstraintPredicate,
  TTargetPattern,
  TConstraintEngineStatus,
} from './constraint/types';

// Model
export { MetaData } from './model/meta-data';
export { MetaAttribute } from './model/meta-attribute';
export { MetaObject } from './model/meta-object';
export { MetaField } from './model/meta-field';
export { MetaIdentity, IDENTITY_GENERATIONS } from './model/meta-identity';
export type { TIdentityGeneration } from './model/meta-identity';
export { MetaRelationship } from './model/meta-relationship';
export type { TRelationshipCardinality, TRelationshipLifecycle } from './model/meta-relationship';
export { MetaValidator } from './model/meta-validator';
export { MetaView } from './model/meta-view';
export { getAttrCodec, inferAttrSubType } from './model/attr-codecs';
export type { TAttrValue, TAttrCodec } from './model/attr-codecs';

// Built-in types
export { registerCoreTypes, CORE_TYPE_MODULES } from './types/register';
export type { TTypeModule } from './types/register';
export { createCoreConstraints } from './types/core-constraints';

// Loading
export { MetaDataLoader } from './loader/meta-data-loader';
export type { TLoaderState } from './loader/meta-data-loader';
export { LoaderOptionsSchema, resolveLoaderOptions } from './loader/options';
export type { TLoaderOptions, TLoaderOptionsInput } from './loader/options';
export { MetaDataSources } from './loader/sources';
export type { TMetaDataSource } from './loader/sources';
export { qualifyName, splitQualifiedName, isQualified, expandPackage, findPackageFor } from './loader/package-utils';
export { validateTree } from './loader/validation';
export type { ValidationResult, TValidationIssue } from './loader/validation';
export {
  parseDocument,
  clearDocumentCache,
  getDocumentCacheSize,
  getDocumentCacheStats,
  detectFormat,
} from './loader/parser';
export type { TDocumentCacheStats } from './loader/parser';
export type { TDocumentFormat, TDocumentRecord, TMetaDataDocument, TInlineAttribute, TLoadStatistics } from './loader/parser';

// Paths
export { buildPath, formatPath, toPathExpression, describeNode } from './path/meta-data-path';
export type { TPathSegment, TMetaDataPath } from './path/meta-data-path';
export { parseMetaDataPath, getPathGrammar } from './path/path-parser';
export { resolvePath, findByPath } from './path/resolve';

// Writers
export { writeJsonDocument } from './io/json-writer';
export { writeXmlDocument } from './io/xml-writer';
export type { TWriteOptions } from './io/document-writer';

// Logging
export { createLogger, setLogLevel, getLogLevel, setLogSink } from './utils/logger';
export type { Logger, TLogLevel, TLogSink } from './utils/logger';
