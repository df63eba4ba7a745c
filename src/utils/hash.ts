/**
 * SHA-256 content hashing.
 *
 * Digests are 64-character lowercase hex strings with no prefix; they key the
 * text batch store and the `sha256` column of the download database.
 *
 * @module utils/hash
 */

import crypto from 'crypto';
import fs from 'fs';

const CHUNK_SIZE = 1024 * 1024;

const HASH_PATTERN = /^[a-f0-9]{64}$/;

export function hashBuffer(content: string | Buffer): string {
  return crypto.createHash('sha256').update(content).digest('hex');
}

/**
 * Hash a file by streaming it in 1 MiB chunks.
 *
 * Open and mid-stream read errors reject unchanged so the caller can decide
 * whether to skip the file or abort.
 */
export function hashFile(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash('sha256');
    const stream = fs.createReadStream(filePath, { highWaterMark: CHUNK_SIZE });

    stream.on('data', (chunk: string | Buffer) => {
      hash.update(chunk);
    });

    stream.on('end', () => {
      resolve(hash.digest('hex'));
    });

    stream.on('error', error => {
      stream.destroy();
      reject(error);
    });
  });
}

export function isValidHash(value: string): boolean {
  return HASH_PATTERN.test(value);
}
