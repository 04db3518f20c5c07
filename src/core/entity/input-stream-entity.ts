import type { Readable } from 'stream';
import { UNKNOWN_CONTENT_LENGTH, type HttpEntity } from '../../types/entity';
import type { EntityMetadata } from './byte-array-entity';

/**
 * Non-repeatable entity over a stream the caller already opened (a socket body,
 * a file stream). The stream is handed out once; later getContent() calls throw.
 */
export class InputStreamEntity implements HttpEntity {
  private consumed = false;

  constructor(
    private readonly stream: Readable,
    private readonly length: number = UNKNOWN_CONTENT_LENGTH,
    private readonly metadata: EntityMetadata = {}
  ) {}

  getContentLength(): number {
    return this.length;
  }

  isRepeatable(): boolean {
    return false;
  }

  getContent(): Readable {
    if (this.consumed) {
      throw new Error('Content has been consumed');
    }
    this.consumed = true;
    return this.stream;
  }

  getContentType(): string | undefined {
    return this.metadata.contentType;
  }

  getContentEncoding(): string | undefined {
    return this.metadata.contentEncoding;
  }
}
