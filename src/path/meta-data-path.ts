/**
 * @module path/meta-data-path
 *
 * Location of a node inside a metadata tree, expressed as the chain of
 * (type, subType, name) segments from the top-level node down.
 */

import type { MetaData } from '../model/meta-data';
import { TYPE_NAMES } from '../constants';

export interface TPathSegment {
  type: string;
  subType?: string;
  name: string;
}

export type TMetaDataPath = TPathSegment[];

/**
 * Segments from the outermost ancestor down to `node`. The loader root is not
 * part of the path.
 */
export function buildPath(node: MetaData): TMetaDataPath {
  const segments: TMetaDataPath = [];
  let current: MetaData | undefined = node;
  while (current) {
    if (current.type !== TYPE_NAMES.LOADER) {
      segments.unshift({ type: current.type, subType: current.subType, name: current.name });
    }
    current = current.getParent();
  }
  return segments;
}

/** Human-readable form: `object:acme::User(pojo) → field:id(long)` */
export function formatPath(path: TMetaDataPath): string {
  return path
    .map((s) => `${s.type}:${s.name}${s.subType ? `(${s.subType})` : ''}`)
    .join(' → ');
}

/** Expression form accepted by parseMetaDataPath: `object:acme::User/field:id(long)` */
export function toPathExpression(path: TMetaDataPath): string {
  return path
    .map((s) => `${s.type}:${s.name}${s.subType ? `(${s.subType})` : ''}`)
    .join('/');
}

export function describeNode(node: MetaData): string {
  const path = buildPath(node);
  return path.length > 0 ? formatPath(path) : `${node.type}:${node.name}(${node.subType})`;
}
