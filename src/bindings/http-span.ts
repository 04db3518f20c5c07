/**
 * Span bindings for recorded HTTP bodies: attribute keys, sinks that write to
 * a span or an in-memory bag, and fromSpan() to read the bodies back.
 */

import type { Attributes, AttributeValue } from '@opentelemetry/api';
import type { AttributeSink, CapturedBody } from '../types/entity';

export const HTTP_REQUEST_BODY = 'http.request.body';
export const HTTP_REQUEST_BODY_SIZE = 'http.request.body.size';
export const HTTP_RESPONSE_BODY = 'http.response.body';
export const HTTP_RESPONSE_BODY_SIZE = 'http.response.body.size';

export type BodyDirection = 'request' | 'response';

const KEYS: Record<BodyDirection, { body: string; size: string }> = {
  request: { body: HTTP_REQUEST_BODY, size: HTTP_REQUEST_BODY_SIZE },
  response: { body: HTTP_RESPONSE_BODY, size: HTTP_RESPONSE_BODY_SIZE },
};

/** Body and size attributes for one direction; empty when nothing was captured. */
export function bodyAttributes(direction: BodyDirection, body: CapturedBody | undefined): Attributes {
  if (!body) return {};
  const keys = KEYS[direction];
  return { [keys.body]: body.text, [keys.size]: body.actualSize };
}

/** Writes every defined attribute into the sink. */
export function putAll(sink: AttributeSink, attributes: Attributes): void {
  for (const [key, value] of Object.entries(attributes)) {
    if (value !== undefined) sink.put(key, value);
  }
}

/** Adapts an OTel span to an AttributeSink. */
export function spanSink(span: { setAttribute(key: string, value: AttributeValue): unknown }): AttributeSink {
  return {
    put(key, value) {
      span.setAttribute(key, value);
    },
  };
}

export type AttributesBuilder = AttributeSink & {
  get(key: string): AttributeValue | undefined;
  build(): Attributes;
};

/** In-memory sink; build() returns a snapshot copy. */
export function attributesBuilder(): AttributesBuilder {
  const attributes: Attributes = {};
  return {
    put(key, value) {
      attributes[key] = value;
    },
    get(key) {
      return attributes[key];
    },
    build() {
      return { ...attributes };
    },
  };
}

export type RecordedBody = { body: string; size: number };

/** Bodies read back from a span. A direction is present only if both keys were recorded. */
export type HttpBodySpanData = {
  request?: RecordedBody;
  response?: RecordedBody;
};

function readDirection(attrs: Attributes, direction: BodyDirection): RecordedBody | undefined {
  const keys = KEYS[direction];
  const body = attrs[keys.body];
  const size = attrs[keys.size];
  if (typeof body === 'string' && typeof size === 'number') return { body, size };
  return undefined;
}

/** Reads recorded bodies from a finished (or test) span. */
export function fromSpan(span: { attributes?: Attributes } | undefined): HttpBodySpanData {
  const attrs = span?.attributes ?? {};
  const data: HttpBodySpanData = {};
  const request = readDirection(attrs, 'request');
  const response = readDirection(attrs, 'response');
  if (request) data.request = request;
  if (response) data.response = response;
  return data;
}

/** HttpSpan namespace for the body bindings. */
export const HttpSpan = { bodyAttributes, spanSink, fromSpan };
