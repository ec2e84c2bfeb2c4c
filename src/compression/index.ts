/**
 * Compression support for input files
 *
 * @example
 * ```typescript
 * import { CompressionDetector, GzipDecompressor } from './compression';
 *
 * if (CompressionDetector.fromExtension(path) === 'gzip') {
 *   stream = GzipDecompressor.wrapStream(stream);
 * }
 * ```
 */

export { CompressionDetector } from './detector';
export { GzipDecompressor } from './gzip';
export { CompressionError } from '../errors';
export type { CompressionFormat } from '../types';
