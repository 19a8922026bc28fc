/**
 * Standard HTTP methods. Any other RFC 9110 token is accepted as well,
 * hence the `string & {}` arm.
 */
export type HttpMethod =
  | "GET"
  | "POST"
  | "PATCH"
  | "PUT"
  | "DELETE"
  | "HEAD"
  | "OPTIONS"
  | "CONNECT"
  | "TRACE"
  | (string & {});

/**
 * Wire-level request produced once by materialization and handed to a
 * transport. Pre-send hooks may mutate it in place.
 */
export interface WireRequest {
  method: string;
  url: URL;
  headers: Headers;
  /** Encoded request body, if any */
  body?: string | Uint8Array;
  /** Per-attempt timeout the transport must enforce */
  timeoutMs: number;
}

/**
 * Body accepted by the builder. Strings and bytes are sent as-is,
 * everything else is serialized as JSON.
 */
export type RequestBody = string | Uint8Array | Record<string, unknown> | unknown[];
