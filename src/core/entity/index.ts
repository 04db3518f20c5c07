export { ByteArrayEntity, StringEntity, MATERIALIZE_CHUNK_SIZE, type EntityMetadata } from './byte-array-entity';
export { InputStreamEntity } from './input-stream-entity';
export { BasicHttpRequest, BasicHttpResponse } from './message';
