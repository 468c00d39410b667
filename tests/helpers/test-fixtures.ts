/**
 * Shared fixtures for loader and writer tests
 */

import { createMetaDataContext, type TMetaDataContext } from '../../src/context';
import type { MetaDataLoader } from '../../src/loader/meta-data-loader';
import type { TLoaderOptionsInput } from '../../src/loader/options';
import type { TAttrValue } from '../../src/model/attr-codecs';
import { MetaAttribute } from '../../src/model/meta-attribute';
import type { TypeRegistry } from '../../src/registry/type-registry';

export function createTestContext(): TMetaDataContext {
  return createMetaDataContext();
}

/** JSON document text with the given package and top-level children */
export function jsonDocument(pkg: string, children: unknown[]): string {
  return JSON.stringify({ metadata: { package: pkg, children } });
}

/**
 * User model: a pojo with a long id, an email with a length limit and a
 * required validator, and a primary identity on id.
 */
export const USER_MODEL = jsonDocument('acme::model', [
  {
    object: {
      name: 'User',
      subType: 'pojo',
      children: [
        { field: { name: 'id', subType: 'long' } },
        {
          field: {
            name: 'email',
            subType: 'string',
            '@maxLength': 50,
            children: [{ validator: { subType: 'required' } }],
          },
        },
        { identity: { name: 'pk', subType: 'primary', '@fields': ['id'], '@generation': 'increment' } },
      ],
    },
  },
]);

export function loadModel(text: string, options: TLoaderOptionsInput = {}, sourceName = 'model.json'): MetaDataLoader {
  const loader = createTestContext().createLoader(options);
  return loader.loadFromStream(text, sourceName).finish();
}

/** Detached attribute of the given subType holding `value` */
export function createAttr(
  registry: TypeRegistry,
  subType: string,
  name: string,
  value?: TAttrValue
): MetaAttribute {
  const node = registry.createInstance('attr', subType, name);
  if (!MetaAttribute.isMetaAttribute(node)) {
    throw new Error(`attr.${subType} is not an attribute`);
  }
  if (value !== undefined) node.setValue(value);
  return node;
}

/** The error thrown by `fn`, or undefined when it returns normally */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}
