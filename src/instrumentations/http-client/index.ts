/**
 * Client-side instrumentation for any HTTP client exposing
 * execute(request, handler). Each call gets a CLIENT span carrying the
 * recorded request and response bodies.
 */

import shimmer from 'shimmer';
import { context, trace, SpanKind, SpanStatusCode, type Tracer } from '@opentelemetry/api';
import type { HttpRequestLike } from '../../types/entity';
import { loadCaptureConfig, type CaptureConfig } from '../../config/config-manager';
import { HttpEntityRecorder } from '../../capture/entity-recorder';
import { wrapResponseHandler, type ResponseHandler } from '../../capture/response-handler';
import { spanSink } from '../../bindings/http-span';

export const INSTRUMENTATION_NAME = 'http-entity-recorder';

export interface HttpClientLike {
  execute<T>(request: HttpRequestLike, handler: ResponseHandler<T>): Promise<T>;
}

export type InstrumentHttpClientOptions = {
  tracer?: Tracer;
  /** Ignored when `recorder` is given. Defaults to loadCaptureConfig(). */
  config?: CaptureConfig;
  recorder?: HttpEntityRecorder;
};

export function isInstrumented(client: HttpClientLike): boolean {
  return Reflect.get(client.execute, '__wrapped') === true;
}

/** Patches client.execute in place. Calling it twice leaves the first patch. */
export function instrumentHttpClient(client: HttpClientLike, options: InstrumentHttpClientOptions = {}): void {
  if (isInstrumented(client)) return;
  const tracer = options.tracer ?? trace.getTracer(INSTRUMENTATION_NAME);
  const recorder = options.recorder ?? new HttpEntityRecorder(options.config ?? loadCaptureConfig());

  shimmer.wrap(client, 'execute', (original) =>
    async function execute<T>(this: HttpClientLike, request: HttpRequestLike, handler: ResponseHandler<T>): Promise<T> {
      const parentContext = context.active();
      const span = tracer.startSpan(
        request.method.toUpperCase(),
        {
          kind: SpanKind.CLIENT,
          attributes: { 'http.request.method': request.method.toUpperCase(), 'url.full': request.url },
        },
        parentContext
      );
      let ended = false;

      await recorder.onStart(spanSink(span), request);

      const wrapped = wrapResponseHandler({
        span,
        parentContext,
        recorder,
        handler,
        onSpanEnd: () => {
          ended = true;
        },
      });
      try {
        return await context.with(trace.setSpan(parentContext, span), () =>
          original.call<HttpClientLike, [HttpRequestLike, ResponseHandler<T>], Promise<T>>(this, request, wrapped)
        );
      } catch (err) {
        if (!ended) {
          span.recordException(err instanceof Error ? err : String(err));
          span.setStatus({ code: SpanStatusCode.ERROR, message: err instanceof Error ? err.message : String(err) });
          span.end();
          ended = true;
        }
        throw err;
      } finally {
        // execute resolved without handing a response to the handler
        if (!ended) span.end();
      }
    }
  );
}

export function uninstrumentHttpClient(client: HttpClientLike): void {
  if (!isInstrumented(client)) return;
  shimmer.unwrap(client, 'execute');
}
