import { STATUS_CODES } from "node:http";
import { Transport } from "@stepwire/core";
import type { TransportResponse, WireRequest } from "@stepwire/core";
import superagent, { type Response } from "superagent";

const encoder = new TextEncoder();

function toHeaders(source: Record<string, unknown>): Headers {
  const headers = new Headers();
  for (const [name, value] of Object.entries(source)) {
    if (Array.isArray(value)) {
      for (const item of value) {
        headers.append(name, String(item));
      }
    } else if (value !== undefined && value !== null) {
      headers.append(name, String(value));
    }
  }
  return headers;
}

function toBytes(body: unknown, text: unknown): Uint8Array {
  if (body instanceof Uint8Array) {
    return body;
  }
  return encoder.encode(typeof text === "string" ? text : "");
}

/**
 * Transport backed by Superagent. The response body is always buffered
 * as raw bytes and no status code is treated as a failure.
 *
 * @example
 * ```typescript
 * const api = new Service(new SuperagentTransport()).withHost("https://api.example.com");
 * ```
 */
export default class SuperagentTransport extends Transport<Response> {
  public async createRequest(request: WireRequest): Promise<Response> {
    const { method, url, headers, body, timeoutMs } = request;

    const pending = superagent(method, url.href)
      .set(Object.fromEntries(headers))
      .timeout(timeoutMs)
      .ok(() => true)
      .responseType("blob");

    if (body !== undefined) {
      pending.send(
        typeof body === "string"
          ? body
          : Buffer.from(body.buffer, body.byteOffset, body.byteLength)
      );
    }

    return pending;
  }

  public getResult(response: Response): TransportResponse {
    const header: Record<string, unknown> = response.header;
    return {
      status: response.status,
      statusText: STATUS_CODES[response.status] ?? "",
      headers: toHeaders(header),
      readBody: async () => toBytes(response.body, response.text),
    };
  }
}
