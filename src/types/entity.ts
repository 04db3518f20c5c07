/**
 * Entity and message contracts shared by capture, bindings and instrumentation.
 * An entity is an HTTP payload exposed as a byte stream plus metadata; the
 * client layer owns it and capture only borrows or replaces it.
 */

import type { Readable } from 'stream';
import type { AttributeValue } from '@opentelemetry/api';

/** Declared length reported by entities whose size is not known up front (chunked, streamed). */
export const UNKNOWN_CONTENT_LENGTH = -1;

export interface HttpEntity {
  /** Declared byte length, or UNKNOWN_CONTENT_LENGTH. */
  getContentLength(): number;
  /** True when getContent() can be called any number of times. */
  isRepeatable(): boolean;
  /**
   * Byte source. Repeatable entities return a fresh stream per call;
   * non-repeatable entities hand out their single stream once.
   */
  getContent(): Readable;
  getContentType(): string | undefined;
  getContentEncoding(): string | undefined;
}

/** Anything carrying an optional entity that may be swapped for a replacement. */
export interface HttpMessageLike {
  getEntity(): HttpEntity | undefined;
  setEntity(entity: HttpEntity | undefined): void;
}

export interface HttpRequestLike extends HttpMessageLike {
  readonly method: string;
  readonly url: string;
}

export interface HttpResponseLike extends HttpMessageLike {
  readonly statusCode: number;
}

/** Key/value store capture writes into (span, attributes builder, test double). */
export interface AttributeSink {
  put(key: string, value: AttributeValue): void;
}

/** Bounded textual rendering of one entity. */
export type CapturedBody = {
  /** UTF-8 decoded bytes, suffixed with the truncation marker when truncated. */
  text: string;
  /** True entity length: declared when known, otherwise observed. */
  actualSize: number;
  truncated: boolean;
};
