/**
 * In-process stream fixtures for capture tests.
 */

import { Readable } from 'stream';
import type { HttpEntity } from '../../types/entity';

/** Emits `prefix` once, then fails with `message` on the next read. */
export function failingStream(prefix: string, message = 'connection reset'): Readable {
  let sent = false;
  return new Readable({
    read() {
      if (!sent) {
        sent = true;
        this.push(Buffer.from(prefix, 'utf8'));
        return;
      }
      this.destroy(new Error(message));
    },
  });
}

/** Emits each chunk as its own read, the way a socket body arrives. */
export function chunkedStream(chunks: string[]): Readable {
  return Readable.from(
    chunks.map((c) => Buffer.from(c, 'utf8')),
    { objectMode: false }
  );
}

/** Reads an entity's content to the end. */
export async function readEntity(entity: HttpEntity): Promise<Buffer> {
  const parts: Buffer[] = [];
  for await (const chunk of entity.getContent()) {
    parts.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(parts);
}
