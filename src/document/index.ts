export { readDocument, decodeBytes, splitLines } from './reader.js';
export type { XsltDocument, DocumentMetadata, DocumentEncoding } from './types.js';
