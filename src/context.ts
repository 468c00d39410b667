/**
 * Wiring of a ready-to-use registry and loaders bound to it.
 *
 * @example
 * ```typescript
 * const context = createMetaDataContext();
 * const loader = context.createLoader({ name: 'model' });
 * loader.loadFromStream(xml, 'model.xml').finish();
 * ```
 */

import { MetaDataLoader } from './loader/meta-data-loader';
import type { TLoaderOptionsInput } from './loader/options';
import { TypeRegistry } from './registry/type-registry';
import { registerCoreTypes } from './types/register';
import type { TTypeModule } from './types/register';

export interface TMetaDataContextOptions {
  /** Extra registrations run after the core types, before the registry is frozen */
  typeModules?: TTypeModule[];
  /** Leave the registry open for later registrations */
  freeze?: boolean;
}

export interface TMetaDataContext {
  registry: TypeRegistry;
  createLoader(options?: TLoaderOptionsInput): MetaDataLoader;
}

export function createMetaDataContext(options: TMetaDataContextOptions = {}): TMetaDataContext {
  const registry = new TypeRegistry();
  registry.initialize((r) => {
    registerCoreTypes(r);
    for (const register of options.typeModules ?? []) {
      register(r);
    }
  });
  if (options.freeze !== false) {
    registry.freeze();
  }
  return {
    registry,
    createLoader: (loaderOptions = {}) => new MetaDataLoader(registry, loaderOptions),
  };
}
