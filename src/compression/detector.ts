/**
 * Compression format detection for FASTA files
 *
 * Gzip is recognised by file extension, including composite extensions such
 * as `.fasta.gz`, or by its two magic bytes.
 */

import { CompressionError } from "../errors";
import type { CompressionFormat } from "../types";

const GZIP_MAGIC_FIRST_BYTE = 0x1f;
const GZIP_MAGIC_SECOND_BYTE = 0x8b;

const GZIP_EXTENSIONS = [".gz", ".gzip"] as const;

/**
 * Compression format detector
 *
 * @example Detection from file extension
 * ```typescript
 * CompressionDetector.fromExtension('/data/genome.fasta.gz'); // 'gzip'
 * CompressionDetector.fromExtension('/data/genome.fa');       // 'none'
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
      throw new CompressionError("File path must not be empty", "none", "detect");
    }

    const normalizedPath = filePath.toLowerCase().replace(/\\/g, "/");
    return GZIP_EXTENSIONS.some((ext) => normalizedPath.endsWith(ext)) ? "gzip" : "none";
  }

  /**
   * Detect compression format from the leading bytes of the data
   */
  static fromMagicBytes(bytes: Uint8Array): CompressionFormat {
    return bytes.length >= 2 &&
      bytes[0] === GZIP_MAGIC_FIRST_BYTE &&
      bytes[1] === GZIP_MAGIC_SECOND_BYTE
      ? "gzip"
      : "none";
  }
}
