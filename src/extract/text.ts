/**
 * Text Extraction
 * ===============
 *
 * Boundary for turning a document into source text. Only UTF-8 text
 * documents are handled here; binary formats belong to other extractors.
 */

import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import { normalizeBytes } from '../utils/normalize.js';

// =============================================================================
// Types
// =============================================================================

/**
 * A document to extract text from: in-memory bytes or a file on disk.
 */
export type SourceDocument =
  | { kind: 'bytes'; name: string; bytes: Uint8Array }
  | { kind: 'file'; path: string };

export interface TextExtractor {
  readonly name: string;

  /**
   * Extract raw text from a document.
   *
   * @throws ExtractionError when no usable text can be produced
   */
  extract(document: SourceDocument): Promise<string>;
}

export class ExtractionError extends Error {
  constructor(
    message: string,
    readonly document: string,
    readonly details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'ExtractionError';
  }
}

export function documentName(document: SourceDocument): string {
  return document.kind === 'file' ? basename(document.path) : document.name;
}

// =============================================================================
// Plain Text
// =============================================================================

export const TEXT_EXTENSIONS: readonly string[] = ['', '.txt', '.text', '.md', '.markdown'];

/**
 * Extracts UTF-8 text: BOM stripped, line endings normalized to LF, NFC.
 */
export class PlainTextExtractor implements TextExtractor {
  readonly name = 'plain-text';

  async extract(document: SourceDocument): Promise<string> {
    const name = documentName(document);
    const extension = extname(name).toLowerCase();
    if (!TEXT_EXTENSIONS.includes(extension)) {
      throw new ExtractionError(`Unsupported document type: ${extension}`, name, { extension });
    }

    const bytes = document.kind === 'file' ? await this.read(document.path, name) : document.bytes;

    let text: string;
    try {
      text = normalizeBytes(bytes);
    } catch (error) {
      throw new ExtractionError('Document is not valid UTF-8 text', name, {
        reason: error instanceof Error ? error.message : String(error),
      });
    }

    if (text.trim().length === 0) {
      throw new ExtractionError('No text could be extracted from document', name);
    }
    return text;
  }

  private async read(path: string, name: string): Promise<Uint8Array> {
    try {
      return await readFile(path);
    } catch (error) {
      throw new ExtractionError(`Cannot read document: ${path}`, name, {
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
