import { TransportError } from "./errors";
import type { WireRequest } from "./models/request-params";

/**
 * Transport-neutral view of a received response. The body is pulled
 * through `readBody`, which touches the network stream; callers go through
 * `HttpResponse.bytes()` so it happens at most once.
 */
export interface TransportResponse {
  status: number;
  statusText: string;
  headers: Headers;
  readBody(): Promise<Uint8Array>;
}

/**
 * Base class for the HTTP clients requests are sent through. One instance
 * is shared by every request of a Service and must tolerate concurrent
 * calls; connection pooling is left to the underlying client.
 *
 * @template NativeResponse - The response type of the wrapped HTTP client
 *
 * @example
 * ```typescript
 * class MyTransport extends Transport<MyClientResponse> {
 *   public createRequest(request: WireRequest) {
 *     return myClient.send(request.method, request.url.href);
 *   }
 *   public getResult(native: MyClientResponse): TransportResponse {
 *     return { ... };
 *   }
 * }
 * ```
 */
export default abstract class Transport<NativeResponse = unknown> {
  /**
   * Performs one network call. Must reject only on network-level failures,
   * never on HTTP error statuses, and must honour `request.timeoutMs`.
   */
  public abstract createRequest(
    request: WireRequest
  ): Promise<NativeResponse>;

  public abstract getResult(result: NativeResponse): TransportResponse;

  /**
   * Sends the request and normalizes the outcome.
   *
   * @throws {TransportError} If the call fails; the original failure is the `cause`
   */
  public async executeRequest(
    request: WireRequest
  ): Promise<TransportResponse> {
    let result: NativeResponse;
    try {
      result = await this.createRequest(request);
    } catch (error) {
      if (error instanceof TransportError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransportError(
        `${request.method} ${request.url.href} failed: ${reason}`,
        { cause: error }
      );
    }
    return this.getResult(result);
  }
}
