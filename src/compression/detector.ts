/**
 * Compression format detection for annotation and read files
 *
 * Extension checks are cheap and cover the usual `.gff3.gz` / `.fastq.gz`
 * naming; magic bytes settle the question when the name says nothing.
 */

import type { CompressionFormat } from '../types';
import { CompressionError } from '../errors';

const GZIP_MAGIC_FIRST_BYTE = 0x1f;
const GZIP_MAGIC_SECOND_BYTE = 0x8b;

const GZIP_EXTENSIONS = ['.gz', '.gzip'] as const;

/**
 * Compression format detector
 *
 * @example Detection from file extension
 * ```typescript
 * CompressionDetector.fromExtension('/data/annotation.gff3.gz'); // 'gzip'
 * ```
 *
 * @example Detection from magic bytes
 * ```typescript
 * CompressionDetector.fromMagicBytes(new Uint8Array([0x1f, 0x8b, 0x08])); // 'gzip'
 * ```
 */
export class CompressionDetector {
  /**
   * Detect compression format from file extension
   *
   * @throws {CompressionError} If the path is empty
   */
  static fromExtension(filePath: string): CompressionFormat {
    if (filePath.length === 0) {
      throw new CompressionError('File path must not be empty', 'none', 'detect');
    }

    const normalizedPath = filePath.toLowerCase();
    return GZIP_EXTENSIONS.some((ext) => normalizedPath.endsWith(ext)) ? 'gzip' : 'none';
  }

  /**
   * Detect compression format from the leading bytes of a file
   */
  static fromMagicBytes(bytes: Uint8Array): CompressionFormat {
    if (bytes.length >= 2 && bytes[0] === GZIP_MAGIC_FIRST_BYTE && bytes[1] === GZIP_MAGIC_SECOND_BYTE) {
      return 'gzip';
    }
    return 'none';
  }
}
