/**
 * Minimal request/response holders for clients that do not bring their own
 * message types. Entities are swapped through setEntity, never mutated.
 */

import type { HttpEntity, HttpRequestLike, HttpResponseLike } from '../../types/entity';

export class BasicHttpRequest implements HttpRequestLike {
  constructor(
    readonly method: string,
    readonly url: string,
    private entity?: HttpEntity
  ) {}

  getEntity(): HttpEntity | undefined {
    return this.entity;
  }

  setEntity(entity: HttpEntity | undefined): void {
    this.entity = entity;
  }
}

export class BasicHttpResponse implements HttpResponseLike {
  constructor(
    readonly statusCode: number,
    private entity?: HttpEntity
  ) {}

  getEntity(): HttpEntity | undefined {
    return this.entity;
  }

  setEntity(entity: HttpEntity | undefined): void {
    this.entity = entity;
  }
}
