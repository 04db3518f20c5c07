/**
 * Wraps the caller's response handler so the response body is captured before
 * anyone reads it. Order per response: make the entity repeatable and install
 * it, finish the client span, then run the caller's handler in the parent
 * context so spans it opens are not children of the client span.
 */

import { context, SpanStatusCode, type AttributeValue, type Attributes, type Context, type SpanStatus } from '@opentelemetry/api';
import type { HttpResponseLike } from '../types/entity';
import type { HttpEntityRecorder } from './entity-recorder';

export const HTTP_RESPONSE_STATUS_CODE = 'http.response.status_code';

export type ResponseHandler<T> = (response: HttpResponseLike) => T | Promise<T>;

/** The part of a span the wrapper touches; an OTel Span satisfies it. */
export interface ClientSpan {
  setAttribute(key: string, value: AttributeValue): unknown;
  setAttributes(attributes: Attributes): unknown;
  setStatus(status: SpanStatus): unknown;
  end(): void;
}

export type WrapResponseHandlerOptions<T> = {
  span: ClientSpan;
  parentContext: Context;
  recorder: HttpEntityRecorder;
  handler: ResponseHandler<T>;
  /** Called once the span has ended; lets the caller skip ending it again. */
  onSpanEnd?: () => void;
};

/** Sets the status code attribute; 4xx and 5xx mark a client span as failed. */
export function setResponseStatus(span: ClientSpan, statusCode: number): void {
  span.setAttribute(HTTP_RESPONSE_STATUS_CODE, statusCode);
  if (statusCode >= 400) {
    span.setStatus({ code: SpanStatusCode.ERROR });
  }
}

export function wrapResponseHandler<T>(options: WrapResponseHandlerOptions<T>): (response: HttpResponseLike) => Promise<T> {
  const { span, parentContext, recorder, handler, onSpanEnd } = options;
  return async (response) => {
    const original = response.getEntity();
    const outcome = await recorder.afterReceive(original);
    if (outcome.entity !== original) response.setEntity(outcome.entity);

    span.setAttributes(outcome.attributes);
    setResponseStatus(span, response.statusCode);
    span.end();
    onSpanEnd?.();

    return context.with(parentContext, () => handler(response));
  };
}
