import { NotFoundError } from '../errors';
import type { MetaData } from '../model/meta-data';
import { describeNode, type TMetaDataPath } from './meta-data-path';

/**
 * Walk `path` from `root`, one getChild per segment. Inherited children are
 * found like local ones. A segment with a subType only matches a node of that
 * subType.
 */
export function resolvePath(root: MetaData, path: TMetaDataPath): MetaData {
  let current = root;
  for (const segment of path) {
    const next = current.findChild(segment.type, segment.name);
    if (!next || (segment.subType !== undefined && next.subType !== segment.subType)) {
      throw new NotFoundError(
        segment.subType ? `${segment.type}(${segment.subType})` : segment.type,
        segment.name,
        describeNode(current)
      );
    }
    current = next;
  }
  return current;
}

/** Like resolvePath, but undefined on a miss */
export function findByPath(root: MetaData, path: TMetaDataPath): MetaData | undefined {
  try {
    return resolvePath(root, path);
  } catch (error) {
    if (NotFoundError.isNotFoundError(error)) return undefined;
    throw error;
  }
}
