import { createHash } from 'node:crypto';

/** Number of bytes in the finished digest. */
export const DIGEST_LENGTH = 16;

/**
 * Streaming digest of the raw located-variable lines.
 *
 * Only used to notice that the input changed between builds; not a security primitive.
 */
export interface RunningChecksum {
  append(bytes: Uint8Array): void;
  /** Finish the digest. Must be called exactly once. */
  finish(): Uint8Array;
}

export type ChecksumFactory = () => RunningChecksum;

/**
 * MD5 over every appended chunk, in append order.
 */
export function createMd5Checksum(): RunningChecksum {
  const hash = createHash('md5');
  let finished = false;
  return {
    append(bytes: Uint8Array): void {
      if (finished) throw new Error('Checksum already finished; cannot append');
      hash.update(bytes);
    },
    finish(): Uint8Array {
      if (finished) throw new Error('Checksum already finished');
      finished = true;
      return new Uint8Array(hash.digest());
    },
  };
}

/**
 * Render a digest as upper-case hex, two characters per byte.
 */
export function formatDigest(digest: Uint8Array): string {
  let out = '';
  for (const byte of digest) {
    out += (byte & 0xff).toString(16).toUpperCase().padStart(2, '0');
  }
  return out;
}
