/**
 * Records request/response bodies for an in-process client and prints the spans.
 * Run: OTEL_INSTRUMENTATION_HTTP_CLIENT_CAPTURE_REQUEST_BODY=true \
 *      OTEL_INSTRUMENTATION_HTTP_CLIENT_CAPTURE_RESPONSE_BODY=true npm run example
 */

import { Readable } from 'stream';
import { BasicTracerProvider, ConsoleSpanExporter, SimpleSpanProcessor } from '@opentelemetry/sdk-trace-base';
import {
  BasicHttpRequest,
  BasicHttpResponse,
  InputStreamEntity,
  StringEntity,
  instrumentHttpClient,
  loadCaptureConfig,
  type HttpClientLike,
  type HttpEntity,
  type HttpRequestLike,
  type HttpResponseLike,
  type ResponseHandler,
} from '../../src';

async function readAll(entity: HttpEntity): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of entity.getContent()) chunks.push(Buffer.from(chunk));
  return Buffer.concat(chunks);
}

/** Echoes the request body back as a streamed response. */
class EchoClient implements HttpClientLike {
  async execute<T>(request: HttpRequestLike, handler: ResponseHandler<T>): Promise<T> {
    const entity = request.getEntity();
    const echoed = entity ? await readAll(entity) : Buffer.alloc(0);
    const response = new BasicHttpResponse(200, new InputStreamEntity(Readable.from([echoed]), echoed.length));
    return handler(response);
  }
}

async function readText(response: HttpResponseLike): Promise<string> {
  const entity = response.getEntity();
  return entity ? (await readAll(entity)).toString('utf8') : '';
}

async function main(): Promise<void> {
  const provider = new BasicTracerProvider();
  provider.addSpanProcessor(new SimpleSpanProcessor(new ConsoleSpanExporter()));
  const client = new EchoClient();
  instrumentHttpClient(client, { tracer: provider.getTracer('basic-app'), config: loadCaptureConfig() });

  const small = JSON.stringify({ message: 'Hello, World!', timestamp: Date.now() });
  const echoedSmall = await client.execute(
    new BasicHttpRequest('POST', 'https://echo.example.test/post', new StringEntity(small, { contentType: 'application/json' })),
    readText
  );
  console.log(`Echoed ${echoedSmall.length} characters`);

  const large = JSON.stringify({ data: 'This is a long string to create a large request body. '.repeat(100) });
  const echoedLarge = await client.execute(
    new BasicHttpRequest('POST', 'https://echo.example.test/post', new StringEntity(large, { contentType: 'application/json' })),
    readText
  );
  console.log(`Echoed ${echoedLarge.length} characters (span attribute is truncated)`);

  await provider.shutdown();
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
