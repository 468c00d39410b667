/**
 * @module loader/meta-data-loader
 *
 * Root of a metadata tree and driver of its construction.
 *
 * ## States
 *
 * ```
 * NEW ──load──▶ LOADING ──finish()──▶ LOADED (final, read-only)
 *                  │
 *                  └──any fatal error──▶ FAILED (every read throws)
 * ```
 *
 * Loads are serialized: synchronous loads reject re-entrant calls and
 * asynchronous loads queue behind each other.
 */

import { BASE_SUBTYPE, TYPE_NAMES } from '../constants';
import { ConfigurationError, NotFoundError, formatError } from '../errors';
import type { MetaAttribute } from '../model/meta-attribute';
import { MetaData } from '../model/meta-data';
import { MetaObject } from '../model/meta-object';
import { parseMetaDataPath } from '../path/path-parser';
import { resolvePath } from '../path/resolve';
import type { TypeRegistry } from '../registry/type-registry';
import { createLogger } from '../utils/logger';
import { resolveLoaderOptions, type TLoaderOptions, type TLoaderOptionsInput } from './options';
import { qualifyName } from './package-utils';
import { parseDocument } from './parser';
import type { TDocumentFormat, TMetaDataDocument } from './parser/document';
import { RecordProcessor, emptyStatistics, type TLoadStatistics } from './parser/record-processor';
import type { MetaDataSources } from './sources';
import { validateTree, type ValidationResult } from './validation';

const log = createLogger('loader');

export type TLoaderState = 'NEW' | 'LOADING' | 'LOADED' | 'FAILED';

export class MetaDataLoader extends MetaData {
  readonly options: TLoaderOptions;

  private state: TLoaderState = 'NEW';
  private failure: unknown;
  private busy = false;
  private queue: Promise<void> = Promise.resolve();
  private readonly stats: TLoadStatistics = emptyStatistics();
  private readonly processor: RecordProcessor;
  private readonly loadedSources: string[] = [];

  constructor(registry: TypeRegistry, options: TLoaderOptionsInput = {}) {
    const resolved = resolveLoaderOptions(options);
    super({ type: TYPE_NAMES.LOADER, subType: BASE_SUBTYPE, name: resolved.name, registry });
    this.options = resolved;
    this.processor = new RecordProcessor(this, resolved, this.stats);
  }

  static isMetaDataLoader(node: MetaData): node is MetaDataLoader {
    return node instanceof MetaDataLoader;
  }

  getState(): TLoaderState {
    return this.state;
  }

  getLoadedSources(): string[] {
    return [...this.loadedSources];
  }

  getStatistics(): TLoadStatistics {
    return this.processor.getStatistics();
  }

  // ---------------------------------------------------------------------------
  // Loading
  // ---------------------------------------------------------------------------

  /**
   * Parse one document and merge it onto the tree.
   */
  loadFromStream(text: string, sourceName = 'inline', format?: TDocumentFormat): this {
    this.assertLoadable();
    let document: TMetaDataDocument;
    try {
      document = parseDocument(text, sourceName, this.options, format);
    } catch (error) {
      this.fail(error);
      throw error;
    }
    return this.loadDocument(document);
  }

  loadDocument(document: TMetaDataDocument): this {
    this.assertLoadable();
    this.busy = true;
    this.state = 'LOADING';
    try {
      const before = { ...this.processor.getStatistics() };
      this.processor.process(document);
      this.loadedSources.push(document.sourceName);
      if (this.options.verbose) {
        const after = this.processor.getStatistics();
        log.info(
          `${document.sourceName}: ${after.created - before.created} created, ` +
            `${after.overlaid - before.overlaid} overlaid, ${after.attributes - before.attributes} attributes, ` +
            `${after.skipped - before.skipped} skipped`
        );
      }
    } catch (error) {
      this.fail(error);
      throw error;
    } finally {
      this.busy = false;
    }
    return this;
  }

  /**
   * Read and load every source in order. Concurrent calls run one after the
   * other.
   */
  loadFromSources(sources: MetaDataSources): Promise<this> {
    const run = this.queue.then(async () => {
      const documents = await sources.read();
      for (const source of documents) {
        this.loadFromStream(source.text, source.sourceName, source.format);
      }
    });
    // Failures reach the caller through the returned promise; the queue only
    // tracks completion.
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run.then(() => this);
  }

  /**
   * Validate (unless disabled) and make the tree read-only.
   */
  finish(): this {
    this.assertLoadable();
    if (this.options.validateOnLoad) {
      const result = this.validate();
      for (const warning of result.warnings) {
        log.warn(warning.message);
      }
      if (!result.valid) {
        const error = new ConfigurationError(
          `Metadata validation failed:\n${result.errors.map((e) => `  - ${e.message}`).join('\n')}`,
          { loader: this.name }
        );
        this.fail(error);
        throw error;
      }
    }
    this.markFinal(true);
    this.state = 'LOADED';
    log.debug(`Loader '${this.name}' finished with ${this.getChildren(undefined, false).length} top-level nodes`);
    return this;
  }

  validate(): ValidationResult {
    this.assertReadable();
    return validateTree(this);
  }

  private fail(error: unknown): void {
    this.state = 'FAILED';
    this.failure = error;
    log.error(`Loader '${this.name}' failed: ${formatError(error)}`);
  }

  private assertLoadable(): void {
    this.assertReadable();
    if (this.busy) {
      throw new ConfigurationError(`Loader '${this.name}' is already loading`);
    }
    if (this.state === 'LOADED') {
      throw new ConfigurationError(`Loader '${this.name}' is finished and cannot load more documents`);
    }
  }

  private assertReadable(): void {
    if (this.state === 'FAILED') {
      throw new ConfigurationError(`Loader '${this.name}' failed to load: ${formatError(this.failure)}`, {
        loader: this.name,
      }, { cause: this.failure });
    }
  }

  // ---------------------------------------------------------------------------
  // Reads (all refuse to run on a failed loader)
  // ---------------------------------------------------------------------------

  override getChildren(type?: string, includeInherited = true): MetaData[] {
    this.assertReadable();
    return super.getChildren(type, includeInherited);
  }

  override findLocalChild(type: string, name: string): MetaData | undefined {
    this.assertReadable();
    return super.findLocalChild(type, name);
  }

  override getChild(type: string, name: string): MetaData {
    this.assertReadable();
    return super.getChild(type, name);
  }

  override findLocalAttr(name: string): MetaAttribute | undefined {
    this.assertReadable();
    return super.findLocalAttr(name);
  }

  getMetaObjects(): MetaObject[] {
    return this.getChildrenOfType(TYPE_NAMES.OBJECT, MetaObject.isMetaObject);
  }

  /**
   * Object by fully qualified name, or by short name within `pkg`.
   */
  getMetaObjectByName(name: string, pkg?: string): MetaObject {
    const node = this.getChild(TYPE_NAMES.OBJECT, pkg ? qualifyName(pkg, name) : name);
    if (!MetaObject.isMetaObject(node)) {
      throw new NotFoundError(TYPE_NAMES.OBJECT, name, this.name);
    }
    return node;
  }

  hasMetaObject(name: string): boolean {
    return this.hasChild(TYPE_NAMES.OBJECT, name);
  }

  /** Node at a path expression such as `object:acme::User/field:id` */
  getMetaDataByPath(expression: string): MetaData {
    return resolvePath(this, parseMetaDataPath(expression));
  }
}
