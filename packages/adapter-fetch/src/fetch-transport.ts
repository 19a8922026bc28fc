import { Transport } from "@stepwire/core";
import type { TransportResponse, WireRequest } from "@stepwire/core";

export interface FetchTransportOptions {
  /** Fetch implementation to call; defaults to the global `fetch` */
  fetch?: typeof fetch;
}

/**
 * Transport over the Fetch API. Needs no dependency on Node.js 18+.
 *
 * @example
 * ```typescript
 * const api = new Service(new FetchTransport()).withHost("https://api.example.com");
 * const result = await api.get("/users").execute();
 * ```
 */
export default class FetchTransport extends Transport<Response> {
  private readonly fetchImpl: typeof fetch;

  constructor(options: FetchTransportOptions = {}) {
    super();
    this.fetchImpl = options.fetch ?? fetch;
  }

  /**
   * Sends the request with the wire timeout as an abort signal.
   *
   * @param request - The materialized request
   * @returns A promise that resolves to a Response object
   */
  public createRequest(request: WireRequest): Promise<Response> {
    const { method, url, headers, body, timeoutMs } = request;
    return this.fetchImpl(url, {
      method,
      headers,
      body,
      signal: AbortSignal.timeout(timeoutMs),
    });
  }

  public getResult(response: Response): TransportResponse {
    return {
      status: response.status,
      statusText: response.statusText,
      headers: response.headers,
      readBody: async () => new Uint8Array(await response.arrayBuffer()),
    };
  }
}
