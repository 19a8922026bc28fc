import { Transport } from "@stepwire/core";
import type { TransportResponse, WireRequest } from "@stepwire/core";
import axios, {
  type AxiosAdapter,
  type AxiosInstance,
  type AxiosResponse,
} from "axios";

const encoder = new TextEncoder();

export interface AxiosTransportOptions {
  /** Axios instance to send through; defaults to the global axios */
  instance?: AxiosInstance;
  /** Axios adapter override, e.g. an in-memory adapter */
  adapter?: AxiosAdapter;
}

function toHeaders(source: AxiosResponse["headers"]): Headers {
  const headers = new Headers();
  const entries: [string, unknown][] = Object.entries(source);
  for (const [name, value] of entries) {
    if (value === undefined || value === null) {
      continue;
    }
    if (Array.isArray(value)) {
      for (const item of value) {
        headers.append(name, String(item));
      }
    } else {
      headers.append(name, String(value));
    }
  }
  return headers;
}

function toBytes(data: unknown): Uint8Array {
  if (data instanceof Uint8Array) {
    return data;
  }
  if (data instanceof ArrayBuffer) {
    return new Uint8Array(data);
  }
  if (data === undefined || data === null) {
    return new Uint8Array();
  }
  return encoder.encode(typeof data === "string" ? data : JSON.stringify(data));
}

/**
 * Transport backed by Axios. Responses are requested as raw bytes and every
 * status code is accepted, so only network-level failures reject.
 *
 * @example
 * ```typescript
 * const api = new Service(new AxiosTransport({ instance: axios.create() }))
 *   .withHost("https://api.example.com");
 * ```
 */
export default class AxiosTransport extends Transport<AxiosResponse<unknown>> {
  private readonly client: AxiosInstance;
  private readonly adapter?: AxiosAdapter;

  constructor(options: AxiosTransportOptions = {}) {
    super();
    this.client = options.instance ?? axios;
    this.adapter = options.adapter;
  }

  public createRequest(request: WireRequest): Promise<AxiosResponse<unknown>> {
    const { method, url, headers, body, timeoutMs } = request;
    return this.client.request<unknown>({
      url: url.href,
      method,
      headers: Object.fromEntries(headers),
      data: body,
      timeout: timeoutMs,
      responseType: "arraybuffer",
      validateStatus: () => true,
      adapter: this.adapter,
    });
  }

  public getResult(response: AxiosResponse<unknown>): TransportResponse {
    return {
      status: response.status,
      statusText: response.statusText,
      headers: toHeaders(response.headers),
      readBody: async () => toBytes(response.data),
    };
  }
}
