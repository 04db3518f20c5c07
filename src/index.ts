/**
 * Public entry: bounded HTTP body capture for OpenTelemetry client spans.
 */

export * from './types/entity';
export * from './core/entity';
export {
  createCaptureConfig,
  resolveCaptureConfig,
  loadCaptureConfig,
  ConfigManager,
  DEFAULT_MAX_BODY_SIZE,
  type CaptureConfig,
} from './config/config-manager';
export { captureBody, captureEntity, TRUNCATION_MARKER, type EntityCapture } from './capture/body-capture';
export { makeRepeatable, type RepeatableResult } from './capture/repeatable-entity';
export { HttpEntityRecorder, type RecordOutcome } from './capture/entity-recorder';
export { wrapResponseHandler, type ResponseHandler } from './capture/response-handler';
export {
  HTTP_REQUEST_BODY,
  HTTP_REQUEST_BODY_SIZE,
  HTTP_RESPONSE_BODY,
  HTTP_RESPONSE_BODY_SIZE,
  HttpSpan,
  attributesBuilder,
  spanSink,
} from './bindings/http-span';
export {
  instrumentHttpClient,
  uninstrumentHttpClient,
  type HttpClientLike,
  type InstrumentHttpClientOptions,
} from './instrumentations/http-client';
