import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { glob } from 'glob';
import { ConfigurationError } from '../errors';
import { getErrorMessage } from '../utils/error-utils';
import type { TDocumentFormat } from './parser/document';

export interface TMetaDataSource {
  sourceName: string;
  text: string;
  format?: TDocumentFormat;
}

type TSourceEntry = () => Promise<TMetaDataSource[]>;

/**
 * Ordered list of documents to load. Later sources overlay earlier ones, so
 * order matters; glob matches are sorted for a stable order.
 *
 * @example
 * ```typescript
 * const sources = MetaDataSources.fromFiles(['model/*.xml', 'overlays/*.json'], cwd);
 * await loader.loadFromSources(sources);
 * ```
 */
export class MetaDataSources {
  private readonly entries: TSourceEntry[] = [];

  static fromStrings(...sources: TMetaDataSource[]): MetaDataSources {
    const result = new MetaDataSources();
    for (const source of sources) {
      result.addString(source.text, source.sourceName, source.format);
    }
    return result;
  }

  static fromFiles(patterns: string[], cwd: string = process.cwd()): MetaDataSources {
    const result = new MetaDataSources();
    for (const pattern of patterns) {
      result.addFiles(pattern, cwd);
    }
    return result;
  }

  addString(text: string, sourceName: string, format?: TDocumentFormat): this {
    this.entries.push(async () => [{ sourceName, text, format }]);
    return this;
  }

  addFile(filePath: string): this {
    this.entries.push(async () => [await readSource(filePath)]);
    return this;
  }

  /** Every file matching `pattern`; a pattern matching nothing is an error */
  addFiles(pattern: string, cwd: string = process.cwd()): this {
    this.entries.push(async () => {
      const files = (await glob(pattern, { cwd, absolute: true, nodir: true })).sort();
      if (files.length === 0) {
        throw new ConfigurationError(`No metadata files match '${pattern}' in ${cwd}`);
      }
      return Promise.all(files.map(readSource));
    });
    return this;
  }

  get size(): number {
    return this.entries.length;
  }

  async read(): Promise<TMetaDataSource[]> {
    const result: TMetaDataSource[] = [];
    for (const entry of this.entries) {
      result.push(...(await entry()));
    }
    return result;
  }
}

async function readSource(filePath: string): Promise<TMetaDataSource> {
  try {
    const text = await fs.readFile(filePath, 'utf8');
    return { sourceName: path.basename(filePath), text };
  } catch (error) {
    throw new ConfigurationError(`Cannot read metadata file ${filePath}: ${getErrorMessage(error)}`, {
      sourceName: filePath,
    }, { cause: error });
  }
}
