/**
 * Parsed documents keyed by what decides the parse result: format, source
 * name, the JSON reading rules and a content hash. The oldest unused entry is
 * dropped once the cache is full.
 */

import { createHash } from 'node:crypto';
import type { TDocumentFormat, TMetaDataDocument } from './document';
import type { TJsonReadOptions } from './json-reader';

export interface TDocumentRequest {
  text: string;
  sourceName: string;
  format: TDocumentFormat;
  options: TJsonReadOptions;
}

export interface TDocumentCacheStats {
  size: number;
  hits: number;
  misses: number;
}

export const DEFAULT_DOCUMENT_CACHE_CAPACITY = 100;

export class DocumentCache {
  // Map order doubles as recency: a hit re-inserts its entry at the end
  private readonly documents = new Map<string, TMetaDataDocument>();
  private hits = 0;
  private misses = 0;

  constructor(private readonly capacity: number = DEFAULT_DOCUMENT_CACHE_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Document cache capacity must be a positive integer, got ${capacity}`);
    }
  }

  static keyFor(request: TDocumentRequest): string {
    const { format, sourceName, options, text } = request;
    const hash = createHash('sha256').update(text).digest('hex').slice(0, 16);
    return [format, sourceName, options.strict, options.requireAttributePrefix, hash].join('|');
  }

  /** The cached document for the request, parsing and storing it on a miss */
  resolve(request: TDocumentRequest, parse: (request: TDocumentRequest) => TMetaDataDocument): TMetaDataDocument {
    const key = DocumentCache.keyFor(request);
    const cached = this.documents.get(key);
    if (cached) {
      this.hits++;
      this.documents.delete(key);
      this.documents.set(key, cached);
      return cached;
    }

    this.misses++;
    const document = parse(request);
    this.documents.set(key, document);
    for (const oldest of this.documents.keys()) {
      if (this.documents.size <= this.capacity) break;
      this.documents.delete(oldest);
    }
    return document;
  }

  clear(): void {
    this.documents.clear();
    this.hits = 0;
    this.misses = 0;
  }

  getStats(): TDocumentCacheStats {
    return { size: this.documents.size, hits: this.hits, misses: this.misses };
  }
}
