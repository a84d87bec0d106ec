// Runtime adapter interfaces. Kept small so tests can swap the network out.

export type TransportContext = {
  /** Aborts the request and, once headers arrived, the response body */
  signal?: AbortSignal;
};

export type Transport = {
  fetch: (url: string, init: RequestInit, ctx: TransportContext) => Promise<Response>;
};
