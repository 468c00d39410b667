import { BASE_SUBTYPE, TYPE_NAMES } from '../constants';
import { MetaDataLoader } from '../loader/meta-data-loader';
import { defineType } from '../registry/type-definition-builder';
import type { TypeRegistry } from '../registry/type-registry';
import type { TMetaDataFactory } from '../registry/types';

export const createLoader: TMetaDataFactory = (init) => new MetaDataLoader(init.registry, { name: init.name });

export function registerLoaderType(registry: TypeRegistry): void {
  registry.registerType(
    defineType(TYPE_NAMES.LOADER, BASE_SUBTYPE)
      .inheritsFrom(TYPE_NAMES.METADATA)
      .description('Loader root owning top-level metadata')
      .factory(createLoader)
      .build()
  );
}
