/**
 * Shared fake span for capture tests. Records attributes, status and end()
 * calls, plus the order of those calls, without an OTel SDK.
 */

import type { AttributeValue, Attributes, SpanStatus } from '@opentelemetry/api';
import type { ClientSpan } from '../capture/response-handler';

export type TestSpan = ClientSpan & {
  attributes: Record<string, AttributeValue>;
  status?: SpanStatus;
  ended: boolean;
  /** 'attributes' | 'status' | 'end', in call order. */
  calls: string[];
};

export function testSpan(): TestSpan {
  const attributes: Record<string, AttributeValue> = {};
  const span: TestSpan = {
    attributes,
    ended: false,
    calls: [],
    setAttribute(key: string, value: AttributeValue) {
      attributes[key] = value;
      span.calls.push('attributes');
    },
    setAttributes(values: Attributes) {
      for (const [key, value] of Object.entries(values)) {
        if (value !== undefined) attributes[key] = value;
      }
      span.calls.push('attributes');
    },
    setStatus(status: SpanStatus) {
      span.status = status;
      span.calls.push('status');
    },
    end() {
      span.ended = true;
      span.calls.push('end');
    },
  };
  return span;
}
