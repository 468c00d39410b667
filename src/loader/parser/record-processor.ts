/**
 * @module loader/parser/record-processor
 *
 * Applies a parsed document onto a tree. Every record walks the same states:
 *
 * ```
 * MATCH_TYPE → RESOLVE_OR_CREATE → RESOLVE_SUPER → APPLY_ATTRS → RECURSE_CHILDREN → DONE
 * ```
 *
 * - MATCH_TYPE: unknown (type, subType) is fatal in strict mode, skipped with
 *   its subtree otherwise.
 * - RESOLVE_OR_CREATE: an existing (type, name) under the parent is the merge
 *   target, whether or not the record asked for an overlay. A target only
 *   visible through the parent's super is overloaded and attached locally.
 * - RESOLVE_SUPER: package-relative name first, then the expanded name.
 *   Unresolved supers are always fatal. New nodes without a subType take the
 *   super's.
 * - APPLY_ATTRS: inline values become `attr` children; last write wins.
 */

import { ATTR_SUBTYPES, TYPE_NAMES, WILDCARD } from '../../constants';
import { ConfigurationError, MetaDataError, UnknownTypeError } from '../../errors';
import { inferAttrSubType } from '../../model/attr-codecs';
import { MetaAttribute } from '../../model/meta-attribute';
import type { MetaData } from '../../model/meta-data';
import { describeNode } from '../../path/meta-data-path';
import type { TypeRegistry } from '../../registry/type-registry';
import { createLogger } from '../../utils/logger';
import type { TLoaderOptions } from '../options';
import { expandPackage, findPackageFor, isQualified, qualifyName } from '../package-utils';
import type { TDocumentRecord, TInlineAttribute, TMetaDataDocument } from './document';

const log = createLogger('parser');

export type TRecordState =
  | 'MATCH_TYPE'
  | 'RESOLVE_OR_CREATE'
  | 'RESOLVE_SUPER'
  | 'APPLY_ATTRS'
  | 'RECURSE_CHILDREN'
  | 'DONE';

export interface TLoadStatistics {
  documents: number;
  records: number;
  created: number;
  overlaid: number;
  attributes: number;
  skipped: number;
}

export function emptyStatistics(): TLoadStatistics {
  return { documents: 0, records: 0, created: 0, overlaid: 0, attributes: 0, skipped: 0 };
}

/**
 * Types whose records may omit a name. The subType stands in for it, so the
 * same record loaded twice merges instead of adding a sibling.
 */
const AUTO_NAMED_TYPES: ReadonlySet<string> = new Set([TYPE_NAMES.VALIDATOR, TYPE_NAMES.VIEW]);

interface TRecordScope {
  parent: MetaData;
  isRoot: boolean;
  documentPackage: string;
}

export class RecordProcessor {
  private readonly registry: TypeRegistry;
  private sourceName = '';

  constructor(
    private readonly root: MetaData,
    private readonly options: TLoaderOptions,
    private readonly stats: TLoadStatistics = emptyStatistics()
  ) {
    this.registry = root.getRegistry();
  }

  getStatistics(): TLoadStatistics {
    return { ...this.stats };
  }

  process(document: TMetaDataDocument): void {
    this.sourceName = document.sourceName;
    this.stats.documents++;
    for (const record of document.children) {
      this.processRecord(record, { parent: this.root, isRoot: true, documentPackage: document.package });
    }
  }

  private processRecord(record: TDocumentRecord, scope: TRecordScope): void {
    let state: TRecordState = 'MATCH_TYPE';
    try {
      this.stats.records++;

      // MATCH_TYPE
      const subType = record.subType === WILDCARD ? undefined : record.subType;
      if (!this.matchType(record.type, subType, record)) {
        return;
      }

      if (record.type === TYPE_NAMES.ATTR) {
        state = 'APPLY_ATTRS';
        this.applyAttributeRecord(scope.parent, record, subType);
        state = 'DONE';
        return;
      }

      // RESOLVE_OR_CREATE
      state = 'RESOLVE_OR_CREATE';
      const name = this.resolveName(record, subType);
      const pkg = record.package
        ? expandPackage(scope.documentPackage, record.package)
        : scope.isRoot
          ? scope.documentPackage
          : findPackageFor(scope.parent) || scope.documentPackage;
      const fullName = scope.isRoot && !isQualified(name) ? qualifyName(pkg, name) : name;
      let node = this.findMergeTarget(scope.parent, record.type, subType, fullName);
      if (!node && record.isOverlay) {
        throw new ConfigurationError(
          `Overlay of ${record.type} '${fullName}' has no existing target in ${describeNode(scope.parent)}`
        );
      }

      // RESOLVE_SUPER
      state = 'RESOLVE_SUPER';
      const superNode = record.superName
        ? this.resolveSuper(scope, record.type, record.superName, pkg, fullName)
        : undefined;

      if (node) {
        this.stats.overlaid++;
        if (superNode && node.getSuperData() !== superNode) {
          node.setSuperData(superNode);
        }
      } else {
        const effectiveSubType = subType ?? superNode?.subType;
        if (!effectiveSubType) {
          throw new ConfigurationError(
            `${record.type} '${fullName}' needs a subType or a super to take one from`
          );
        }
        node = this.registry.createInstance(record.type, effectiveSubType, fullName);
        node.setSourceName(this.sourceName);
        if (superNode) {
          node.setSuperData(superNode);
        }
        scope.parent.addChild(node);
        this.stats.created++;
        log.debug(`Created ${describeNode(node)}`);
      }

      // APPLY_ATTRS
      state = 'APPLY_ATTRS';
      for (const attribute of record.attributes) {
        this.applyAttribute(node, attribute);
      }

      // RECURSE_CHILDREN
      state = 'RECURSE_CHILDREN';
      for (const child of record.children) {
        this.processRecord(child, { parent: node, isRoot: false, documentPackage: scope.documentPackage });
      }
      state = 'DONE';
    } catch (error) {
      if (error instanceof MetaDataError && error.context.sourceName === undefined) {
        error.context.sourceName = this.sourceName;
        error.context.location = record.location;
        error.context.state = state;
      }
      throw error;
    }
  }

  /**
   * Returns false when the record should be skipped (lenient mode only).
   */
  private matchType(type: string, subType: string | undefined, record: TDocumentRecord): boolean {
    if (this.registry.hasType(type, subType)) {
      return true;
    }
    const error = new UnknownTypeError(type, subType, this.registry.suggestTypes(type, subType));
    if (this.options.strict) {
      throw error;
    }
    log.warn(`${this.sourceName}: skipping ${record.location}: ${error.message}`);
    this.stats.skipped++;
    return false;
  }

  private resolveName(record: TDocumentRecord, subType: string | undefined): string {
    if (record.name) return record.name;

    const label = `${record.type}${subType ? `.${subType}` : ''}`;
    if (record.isAbstract) {
      throw new ConfigurationError(`Abstract ${label} must have a name`);
    }
    if (!AUTO_NAMED_TYPES.has(record.type)) {
      throw new ConfigurationError(`${label} requires a name`);
    }
    if (!subType) {
      throw new ConfigurationError(`${label} without a name requires a subType`);
    }
    return subType;
  }

  /**
   * Existing node to merge into: a local child, or an inherited one that gets
   * overloaded under `parent`. An inherited node of a different subType is
   * shadowed instead.
   */
  private findMergeTarget(
    parent: MetaData,
    type: string,
    subType: string | undefined,
    name: string
  ): MetaData | undefined {
    const local = parent.findLocalChild(type, name);
    if (local) {
      if (subType && local.subType !== subType) {
        throw new ConfigurationError(
          `Cannot change subType of ${describeNode(local)} to '${subType}'`
        );
      }
      return local;
    }

    const inherited = parent.findChild(type, name);
    if (!inherited || (subType && inherited.subType !== subType)) {
      return undefined;
    }
    const overloaded = inherited.overload();
    overloaded.setSourceName(this.sourceName);
    parent.addChild(overloaded);
    log.debug(`Overloaded inherited ${describeNode(inherited)} under ${describeNode(parent)}`);
    return overloaded;
  }

  private resolveSuper(
    scope: TRecordScope,
    type: string,
    superName: string,
    pkg: string,
    forName: string
  ): MetaData {
    const candidates: string[] = [];
    if (!isQualified(superName) && pkg) {
      candidates.push(qualifyName(pkg, superName));
    }
    candidates.push(expandPackage(findPackageFor(scope.parent) || scope.documentPackage, superName));
    candidates.push(superName);

    const unique = [...new Set(candidates)];
    for (const candidate of unique) {
      const found =
        this.root.findLocalChild(type, candidate) ??
        (scope.isRoot ? undefined : scope.parent.findChild(type, candidate));
      if (found) return found;
    }
    throw new ConfigurationError(
      `Super ${type} '${superName}' of '${forName}' not found (tried: ${unique.join(', ')})`,
      { superName }
    );
  }

  private attributeSubType(node: MetaData, attribute: TInlineAttribute): string {
    const requirement = this.registry.getTypeDefinition(node.type, node.subType)?.attributeRequirements[
      attribute.name
    ];
    if (requirement) return requirement.subType;
    if (attribute.subType) return attribute.subType;
    if (attribute.isArray) return ATTR_SUBTYPES.STRING_ARRAY;
    return this.options.inferAttributeTypes ? inferAttrSubType(attribute.value) : ATTR_SUBTYPES.STRING;
  }

  private applyAttribute(node: MetaData, attribute: TInlineAttribute): void {
    const subType = this.attributeSubType(node, attribute);
    const attr = this.createAttribute(subType, attribute.name);
    attr.setValueAsString(attribute.value);
    node.addChild(attr);
    this.stats.attributes++;
  }

  private applyAttributeRecord(parent: MetaData, record: TDocumentRecord, subType: string | undefined): void {
    if (!record.name) {
      throw new ConfigurationError(`attr record requires a name`);
    }
    const value = record.value ?? '';
    const attr = this.createAttribute(this.attributeSubType(parent, { name: record.name, value, subType }), record.name);
    attr.setSourceName(this.sourceName);
    if (record.value !== undefined) {
      attr.setValueAsString(record.value);
    }
    parent.addChild(attr);
    this.stats.attributes++;
  }

  private createAttribute(subType: string, name: string): MetaAttribute {
    const node = this.registry.createInstance(TYPE_NAMES.ATTR, subType, name);
    if (!MetaAttribute.isMetaAttribute(node)) {
      throw new ConfigurationError(`Factory for attr.${subType} did not produce an attribute`);
    }
    return node;
  }
}
