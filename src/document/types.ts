/**
 * Document Types
 *
 * A document is the materialized, line-addressable form of one stylesheet
 * file. Line i of the file is `lines[i - 1]`.
 */

export type DocumentEncoding = 'utf-8' | 'utf-8-bom' | 'utf-16le' | 'utf-16be' | 'latin1';

export interface DocumentMetadata {
  /** Size on disk */
  sizeBytes: number;
  lineCount: number;
  /** Encoding the bytes were decoded with */
  encoding: DocumentEncoding;
  /** Rough size-based estimate (bytes / 4), available before chunking */
  estimatedTokens: number;
}

export interface XsltDocument {
  path: string;
  /** Raw lines without line terminators */
  lines: string[];
  metadata: DocumentMetadata;
}
