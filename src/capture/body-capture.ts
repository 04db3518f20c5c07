/**
 * Bounded body capture: reads at most maxBodySize bytes of an entity, decodes
 * them as UTF-8 and reports the true length alongside. Never rejects; any
 * failure means "nothing captured".
 */

import { StringDecoder } from 'string_decoder';
import type { CapturedBody, HttpEntity } from '../types/entity';
import type { CaptureConfig } from '../config/config-manager';
import { readBounded } from '../core/runtime/bounded-read';
import { logger } from '../core/logger';
import { makeRepeatable } from './repeatable-entity';

export const TRUNCATION_MARKER = '... (truncated)';

export type EntityCapture = {
  body: CapturedBody | undefined;
  /** Entity the caller must use from now on. */
  entity: HttpEntity | undefined;
  /** True when `entity` replaces a drained non-repeatable original. */
  replaced: boolean;
};

/** Decodes a cut-off prefix, dropping a multi-byte character split by the cap. */
function decodePrefix(bytes: Buffer): string {
  return new StringDecoder('utf8').write(bytes);
}

async function readCapped(
  entity: HttpEntity,
  declaredLength: number,
  maxBodySize: number
): Promise<CapturedBody | undefined> {
  const { bytes, hasMore } = await readBounded(entity.getContent(), maxBodySize);
  if (bytes.length === 0) return undefined;

  const truncated = hasMore || declaredLength > maxBodySize;
  const text = truncated ? decodePrefix(bytes) + TRUNCATION_MARKER : bytes.toString('utf8');
  let actualSize = declaredLength;
  if (actualSize < 0) {
    const observed = entity.getContentLength();
    actualSize = observed >= 0 ? observed : bytes.length;
  }
  return { text, actualSize, truncated };
}

/**
 * Captures `entity` and returns the entity the caller must keep using.
 * Non-repeatable entities are materialized first; if that fails the original
 * is handed back untouched and no body is produced.
 */
export async function captureEntity(
  entity: HttpEntity | undefined,
  config: CaptureConfig
): Promise<EntityCapture> {
  if (!entity) return { body: undefined, entity, replaced: false };
  let current = entity;
  try {
    const declaredLength = entity.getContentLength();
    if (declaredLength === 0) return { body: undefined, entity, replaced: false };

    if (!entity.isRepeatable()) {
      const materialized = await makeRepeatable(entity);
      if (!materialized.replaced) {
        return { body: undefined, entity, replaced: false };
      }
      current = materialized.entity;
    }
    const body = await readCapped(current, declaredLength, config.maxBodySize);
    return { body, entity: current, replaced: current !== entity };
  } catch (err) {
    logger.debug('Failed to capture entity body', err);
    return { body: undefined, entity: current, replaced: current !== entity };
  }
}

/**
 * Captured body of `entity`, or undefined when absent, empty or unreadable.
 * Drains non-repeatable entities; use captureEntity to keep the replacement.
 */
export async function captureBody(
  entity: HttpEntity | undefined,
  config: CaptureConfig
): Promise<CapturedBody | undefined> {
  return (await captureEntity(entity, config)).body;
}
