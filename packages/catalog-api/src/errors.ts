import type { RequestSnapshot, ResponseSnapshot } from "./types.js";

interface CatalogApiErrorParams {
  status?: number;
  request?: RequestSnapshot;
  response?: ResponseSnapshot;
}

export class CatalogApiError extends Error {
  readonly status?: number;
  readonly request?: RequestSnapshot;
  readonly response?: ResponseSnapshot;

  constructor(message: string, params: CatalogApiErrorParams = {}) {
    super(message);
    this.name = this.constructor.name;
    if (params.status !== undefined) {
      this.status = params.status;
    }
    if (params.request !== undefined) {
      this.request = params.request;
    }
    if (params.response !== undefined) {
      this.response = params.response;
    }
  }
}

/** The catalog API refused the request (4xx other than 429). */
export class CatalogApiClientError extends CatalogApiError {}

/** 5xx, 429, an unreadable success body, or no response at all. */
export class CatalogApiServerError extends CatalogApiError {}

export class CatalogApiTransportError extends CatalogApiServerError {
  readonly original: unknown;

  constructor(message: string, original: unknown, params: { request?: RequestSnapshot } = {}) {
    super(message, params);
    this.original = original;
  }
}
