/**
 * Stream readers used by body capture. Both destroy the source before
 * returning, on success and on failure alike.
 */

import type { Readable } from 'stream';

export type BoundedRead = {
  /** At most `limit` bytes, in stream order. */
  bytes: Buffer;
  /** True when the stream still had data once `limit` bytes were taken. */
  hasMore: boolean;
};

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  return Buffer.from(String(chunk), 'utf8');
}

/**
 * Reads up to `limit` bytes. Stops pulling as soon as one byte past the limit
 * is seen, so a large body is never drained just to learn that it was large.
 */
export async function readBounded(source: Readable, limit: number): Promise<BoundedRead> {
  const chunks: Buffer[] = [];
  let length = 0;
  let hasMore = false;
  try {
    for await (const chunk of source) {
      const buf = toBuffer(chunk);
      const take = Math.min(buf.length, limit - length);
      if (take > 0) {
        chunks.push(buf.subarray(0, take));
        length += take;
      }
      if (buf.length > take) {
        hasMore = true;
        break;
      }
    }
  } finally {
    source.destroy();
  }
  return { bytes: Buffer.concat(chunks, length), hasMore };
}

/** Reads the whole stream into memory. */
export async function readFully(source: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  try {
    for await (const chunk of source) {
      chunks.push(toBuffer(chunk));
    }
  } finally {
    source.destroy();
  }
  return Buffer.concat(chunks);
}
