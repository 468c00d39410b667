/**
 * Package name helpers. Packages are `::`-separated; see constants.ts for the
 * relative forms.
 */

import { PKG_SEPARATOR } from '../constants';
import { ConfigurationError } from '../errors';
import type { MetaData } from '../model/meta-data';

const PARENT_PREFIX = `..${PKG_SEPARATOR}`;

export function qualifyName(pkg: string, name: string): string {
  return pkg ? `${pkg}${PKG_SEPARATOR}${name}` : name;
}

export function splitQualifiedName(name: string): { pkg: string; shortName: string } {
  const idx = name.lastIndexOf(PKG_SEPARATOR);
  return idx < 0
    ? { pkg: '', shortName: name }
    : { pkg: name.substring(0, idx), shortName: name.substring(idx + PKG_SEPARATOR.length) };
}

export function isQualified(name: string): boolean {
  return name.includes(PKG_SEPARATOR);
}

/**
 * Resolve `value` against `basePackage`:
 *
 * - `::sub` → `base::sub`
 * - `..::sub` → one level above base, then `sub` (repeatable)
 * - anything else is already absolute
 */
export function expandPackage(basePackage: string, value: string): string {
  if (value.startsWith(PARENT_PREFIX)) {
    const segments = basePackage ? basePackage.split(PKG_SEPARATOR) : [];
    let rest = value;
    while (rest.startsWith(PARENT_PREFIX)) {
      if (segments.length === 0) {
        throw new ConfigurationError(`Relative package '${value}' climbs above the root of '${basePackage}'`);
      }
      segments.pop();
      rest = rest.substring(PARENT_PREFIX.length);
    }
    return [...segments, ...(rest ? [rest] : [])].join(PKG_SEPARATOR);
  }
  if (value.startsWith(PKG_SEPARATOR)) {
    return qualifyName(basePackage, value.substring(PKG_SEPARATOR.length));
  }
  return value;
}

/** The first non-empty package walking up from `node` */
export function findPackageFor(node: MetaData | undefined): string {
  for (let current = node; current; current = current.getParent()) {
    const pkg = current.getPackage();
    if (pkg) return pkg;
  }
  return '';
}
