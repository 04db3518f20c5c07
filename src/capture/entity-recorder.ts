/**
 * Records request and response bodies as span attributes.
 *
 * beforeSend/afterReceive are framework-free; onStart/onEnd adapt them to the
 * extractor callbacks an instrumentation pipeline calls at request start and
 * response end. None of these methods reject.
 */

import type { Attributes } from '@opentelemetry/api';
import type { AttributeSink, HttpEntity, HttpMessageLike, HttpRequestLike, HttpResponseLike } from '../types/entity';
import type { CaptureConfig } from '../config/config-manager';
import { bodyAttributes, putAll, type BodyDirection } from '../bindings/http-span';
import { logger } from '../core/logger';
import { captureEntity } from './body-capture';

export type RecordOutcome = {
  /** Body/size attributes to write; empty when nothing was captured. */
  attributes: Attributes;
  /** Entity the message must carry from now on. */
  entity: HttpEntity | undefined;
};

export class HttpEntityRecorder {
  constructor(private readonly config: CaptureConfig) {}

  /** Captures an outgoing entity. A non-repeatable entity comes back replaced and must be sent in its place. */
  async beforeSend(entity: HttpEntity | undefined): Promise<RecordOutcome> {
    if (!this.config.captureRequestBody) return { attributes: {}, entity };
    return this.record('request', entity);
  }

  /** Captures an incoming entity. The returned entity must be installed on the response before anyone reads it. */
  async afterReceive(entity: HttpEntity | undefined): Promise<RecordOutcome> {
    if (!this.config.captureResponseBody) return { attributes: {}, entity };
    return this.record('response', entity);
  }

  async onStart(attributes: AttributeSink, request: HttpRequestLike): Promise<void> {
    await this.apply(attributes, request, (entity) => this.beforeSend(entity));
  }

  async onEnd(
    attributes: AttributeSink,
    _request: HttpRequestLike,
    response: HttpResponseLike | undefined,
    _error?: unknown
  ): Promise<void> {
    if (!response) return;
    await this.apply(attributes, response, (entity) => this.afterReceive(entity));
  }

  private async record(direction: BodyDirection, entity: HttpEntity | undefined): Promise<RecordOutcome> {
    const captured = await captureEntity(entity, this.config);
    return { attributes: bodyAttributes(direction, captured.body), entity: captured.entity };
  }

  private async apply(
    sink: AttributeSink,
    message: HttpMessageLike,
    recordFn: (entity: HttpEntity | undefined) => Promise<RecordOutcome>
  ): Promise<void> {
    try {
      const original = message.getEntity();
      const outcome = await recordFn(original);
      if (outcome.entity !== original) message.setEntity(outcome.entity);
      putAll(sink, outcome.attributes);
    } catch (err) {
      logger.debug('Failed to record entity body', err);
    }
  }
}
