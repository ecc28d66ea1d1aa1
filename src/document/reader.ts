/**
 * Document Reader
 *
 * Reads a stylesheet from disk and splits it into lines. The whole file is
 * read in one call; chunking needs random access to every line anyway.
 */

import { readFile } from 'node:fs/promises';
import { FileNotFoundError } from '../errors/index.js';
import type { DocumentEncoding, XsltDocument } from './types.js';

interface Decoded {
  text: string;
  encoding: DocumentEncoding;
}

/**
 * Decode raw bytes.
 *
 * A UTF-16 byte order mark wins; otherwise the bytes are tried as strict
 * UTF-8 and fall back to latin1, which accepts any byte sequence.
 */
export function decodeBytes(bytes: Buffer): Decoded {
  if (bytes[0] === 0xff && bytes[1] === 0xfe) {
    return { text: bytes.subarray(2).toString('utf16le'), encoding: 'utf-16le' };
  }

  if (bytes[0] === 0xfe && bytes[1] === 0xff) {
    const body = Buffer.from(bytes.subarray(2, 2 + ((bytes.length - 2) & ~1)));
    return { text: body.swap16().toString('utf16le'), encoding: 'utf-16be' };
  }

  const hasBom = bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf;
  const body = hasBom ? bytes.subarray(3) : bytes;

  try {
    const text = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(body);
    return { text, encoding: hasBom ? 'utf-8-bom' : 'utf-8' };
  } catch (error) {
    if (!(error instanceof TypeError)) throw error;
    return { text: body.toString('latin1'), encoding: 'latin1' };
  }
}

/**
 * Split text into lines.
 *
 * `\r\n` and `\n` both terminate a line. A terminator at the very end does
 * not start another line, so "a\nb\n" is two lines.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];

  const lines = text.split('\n').map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
  if (text.endsWith('\n')) {
    lines.pop();
  }
  return lines;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read a stylesheet into lines plus metadata.
 *
 * @throws FileNotFoundError when the path does not exist
 */
export async function readDocument(path: string): Promise<XsltDocument> {
  let bytes: Buffer;
  try {
    bytes = await readFile(path);
  } catch (error) {
    if (isNotFound(error)) {
      throw new FileNotFoundError(path);
    }
    throw error;
  }

  const { text, encoding } = decodeBytes(bytes);
  const lines = splitLines(text);

  return {
    path,
    lines,
    metadata: {
      sizeBytes: bytes.length,
      lineCount: lines.length,
      encoding,
      estimatedTokens: Math.floor(bytes.length / 4),
    },
  };
}
