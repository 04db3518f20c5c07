/**
 * In-memory entities. Both are repeatable: every getContent() call replays the
 * same bytes from the start, in MATERIALIZE_CHUNK_SIZE slices. Slices are
 * copies, so a consumer writing into a chunk cannot change later reads.
 */

import { Readable } from 'stream';
import type { HttpEntity } from '../../types/entity';

/** Slice size used when replaying buffered bytes as a stream. */
export const MATERIALIZE_CHUNK_SIZE = 8192;

export type EntityMetadata = {
  contentType?: string;
  contentEncoding?: string;
};

export class ByteArrayEntity implements HttpEntity {
  private readonly bytes: Buffer;
  private readonly contentType?: string;
  private readonly contentEncoding?: string;

  constructor(bytes: Buffer | Uint8Array, metadata: EntityMetadata = {}) {
    this.bytes = Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes);
    this.contentType = metadata.contentType;
    this.contentEncoding = metadata.contentEncoding;
  }

  getContentLength(): number {
    return this.bytes.length;
  }

  isRepeatable(): boolean {
    return true;
  }

  getContent(): Readable {
    const slices: Buffer[] = [];
    for (let offset = 0; offset < this.bytes.length; offset += MATERIALIZE_CHUNK_SIZE) {
      slices.push(Buffer.from(this.bytes.subarray(offset, offset + MATERIALIZE_CHUNK_SIZE)));
    }
    return Readable.from(slices, { objectMode: false });
  }

  getContentType(): string | undefined {
    return this.contentType;
  }

  getContentEncoding(): string | undefined {
    return this.contentEncoding;
  }
}

/** UTF-8 text entity; content type defaults to text/plain. */
export class StringEntity extends ByteArrayEntity {
  constructor(text: string, metadata: EntityMetadata = {}) {
    super(Buffer.from(text, 'utf8'), {
      contentType: metadata.contentType ?? 'text/plain; charset=UTF-8',
      contentEncoding: metadata.contentEncoding,
    });
  }
}
