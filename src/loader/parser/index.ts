/**
 * @module loader/parser
 *
 * Entry point turning document text into a TMetaDataDocument. Parsed
 * documents are cached by content hash, so reloading the same text into
 * another loader skips the XML/JSON pass.
 */

import { DocumentCache, type TDocumentCacheStats, type TDocumentRequest } from './document-cache';
import { detectFormat, type TDocumentFormat, type TMetaDataDocument } from './document';
import { readJsonDocument, type TJsonReadOptions } from './json-reader';
import { readXmlDocument } from './xml-reader';

const documentCache = new DocumentCache();

function readDocument({ text, sourceName, format, options }: TDocumentRequest): TMetaDataDocument {
  return format === 'xml' ? readXmlDocument(text, sourceName) : readJsonDocument(text, sourceName, options);
}

export function parseDocument(
  text: string,
  sourceName: string,
  options: TJsonReadOptions,
  format: TDocumentFormat = detectFormat(text, sourceName)
): TMetaDataDocument {
  return documentCache.resolve({ text, sourceName, format, options }, readDocument);
}

export function clearDocumentCache(): void {
  documentCache.clear();
}

export function getDocumentCacheSize(): number {
  return documentCache.getStats().size;
}

export function getDocumentCacheStats(): TDocumentCacheStats {
  return documentCache.getStats();
}

export * from './document';
export { DocumentCache } from './document-cache';
export type { TDocumentCacheStats, TDocumentRequest } from './document-cache';
export { RecordProcessor, emptyStatistics } from './record-processor';
export type { TLoadStatistics, TRecordState } from './record-processor';
