/**
 * Content checksums for datasets.
 *
 * Checksums are always computed over file contents, never over file names.
 * Checksums over several files are computed per file, sorted, and hashed
 * again ("checksum of checksums"), so neither the names nor the order of
 * the files affect the result.
 */

import { createHash, getHashes, type Hash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { ConfigurationError } from './errors.js';

/** Non-cryptographic use only: detecting corruption and duplicates. */
export const DEFAULT_ALGORITHM = 'md5';

/** Block size for reading files and feeding buffers to the hash. */
export const CHUNK_SIZE = 4096;

/**
 * Whether the runtime provides a digest with this name.
 */
export function isSupportedAlgorithm(algorithm: string): boolean {
  return getHashes().includes(algorithm.toLowerCase());
}

/**
 * Label stored in manifest checksum records, e.g. "MD5 checksum".
 */
export function checksumLabel(algorithm: string): string {
  return `${algorithm.toUpperCase()} checksum`;
}

/**
 * Inverse of {@link checksumLabel}. Returns undefined for labels that do not
 * follow the "<ALGORITHM> checksum" pattern.
 */
export function algorithmFromLabel(label: string): string | undefined {
  const match = /^(\S+) checksum$/.exec(label.trim());
  return match ? match[1].toLowerCase() : undefined;
}

export class ChecksumGenerator {
  readonly algorithm: string;

  /**
   * @throws {ConfigurationError} if the runtime has no digest of that name
   */
  constructor(algorithm: string = DEFAULT_ALGORITHM) {
    if (!isSupportedAlgorithm(algorithm)) {
      throw new ConfigurationError(`Unsupported checksum algorithm: ${algorithm}`, { algorithm });
    }
    this.algorithm = algorithm.toLowerCase();
  }

  get label(): string {
    return checksumLabel(this.algorithm);
  }

  /**
   * Hex digest of a byte sequence, fed to the hash in {@link CHUNK_SIZE} blocks.
   */
  hashBytes(data: Uint8Array | string): string {
    const bytes = typeof data === 'string' ? Buffer.from(data) : data;
    const hash = this.hash();
    for (let offset = 0; offset < bytes.length; offset += CHUNK_SIZE) {
      hash.update(bytes.subarray(offset, offset + CHUNK_SIZE));
    }
    return hash.digest('hex');
  }

  /**
   * Hex digest over a list of strings, sorted first so the result does not
   * depend on the order of the input.
   */
  hashStrings(strings: readonly string[]): string {
    const sorted = [...strings].sort();
    const hash = this.hash();
    for (const element of sorted) {
      hash.update(element);
    }
    return hash.digest('hex');
  }

  /**
   * Hex digest of a file's contents. The file is streamed, never loaded as a whole.
   */
  async hashFile(filePath: string): Promise<string> {
    const hash = this.hash();
    const stream = createReadStream(filePath, { highWaterMark: CHUNK_SIZE });
    for await (const chunk of stream) {
      hash.update(chunk);
    }
    return hash.digest('hex');
  }

  /**
   * Checksum for one or several files.
   *
   * A single file gives the digest of its content; several files give the
   * digest of their sorted per-file digests.
   */
  async hashFileSet(filePaths: string | readonly string[]): Promise<string> {
    if (typeof filePaths === 'string') return this.hashFile(filePaths);
    if (filePaths.length === 1) return this.hashFile(filePaths[0]);

    const checksums: string[] = [];
    for (const filePath of filePaths) {
      checksums.push(await this.hashFile(filePath));
    }
    return this.hashStrings(checksums);
  }

  private hash(): Hash {
    return createHash(this.algorithm);
  }
}
