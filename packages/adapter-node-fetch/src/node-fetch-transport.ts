import { Transport } from "@stepwire/core";
import type { TransportResponse, WireRequest } from "@stepwire/core";
import fetch, { type Response } from "node-fetch";

export type NodeFetch = typeof fetch;

export interface NodeFetchTransportOptions {
  /** Replaces node-fetch's `fetch`, mainly for tests */
  fetch?: NodeFetch;
}

/**
 * Transport backed by node-fetch. Use it where the global Fetch API is
 * unavailable or node-fetch's agent options are needed.
 */
export default class NodeFetchTransport extends Transport<Response> {
  private readonly fetchImpl: NodeFetch;

  constructor(options: NodeFetchTransportOptions = {}) {
    super();
    this.fetchImpl = options.fetch ?? fetch;
  }

  public createRequest(request: WireRequest): Promise<Response> {
    const { method, url, headers, body, timeoutMs } = request;
    return this.fetchImpl(url, {
      method,
      headers: [...headers],
      // node-fetch takes Buffers, not bare Uint8Arrays
      body:
        body instanceof Uint8Array
          ? Buffer.from(body.buffer, body.byteOffset, body.byteLength)
          : body,
      signal: AbortSignal.timeout(timeoutMs),
    });
  }

  public getResult(response: Response): TransportResponse {
    return {
      status: response.status,
      statusText: response.statusText,
      headers: new Headers([...response.headers]),
      readBody: async () => new Uint8Array(await response.arrayBuffer()),
    };
  }
}
