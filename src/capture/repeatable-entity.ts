/**
 * Turns a read-once entity into an in-memory one that every later consumer
 * (capture, application code, other instrumentation) can read in full.
 * Reads the whole body regardless of the capture limit.
 */

import type { HttpEntity } from '../types/entity';
import { ByteArrayEntity } from '../core/entity/byte-array-entity';
import { readFully } from '../core/runtime/bounded-read';
import { logger } from '../core/logger';

export type RepeatableResult = {
  /** Entity the caller should keep: the replacement, or the input when nothing changed. */
  entity: HttpEntity;
  /** Bytes buffered from the original stream; 0 when no materialization took place. */
  bytesRead: number;
  /** True when `entity` is a new object the caller must substitute for the original. */
  replaced: boolean;
};

/**
 * Returns a repeatable equivalent of `entity`. Repeatable input is returned as is.
 * On a read failure the original entity comes back with replaced=false.
 */
export async function makeRepeatable(entity: HttpEntity): Promise<RepeatableResult> {
  if (entity.isRepeatable()) {
    return { entity, bytesRead: 0, replaced: false };
  }
  try {
    const bytes = await readFully(entity.getContent());
    const repeatable = new ByteArrayEntity(bytes, {
      contentType: entity.getContentType(),
      contentEncoding: entity.getContentEncoding(),
    });
    return { entity: repeatable, bytesRead: bytes.length, replaced: true };
  } catch (err) {
    logger.debug('Failed to make entity repeatable', err);
    return { entity, bytesRead: 0, replaced: false };
  }
}
