import type { RequestError } from "../errors";
import type LogicalRequest from "../logical-request";
import type HttpResponse from "../response";
import type { WireRequest } from "./request-params";

/**
 * Lifecycle callbacks attached to a Service (shared scope) or to a single
 * LogicalRequest (request scope). Shared-scope hooks always run first.
 *
 * @example
 * ```typescript
 * const auth: RequestHook = {
 *   onBeforeSend: (wire) => wire.headers.set("Authorization", "Bearer test-token"),
 * };
 * service.use(auth);
 * ```
 */
export interface RequestHook {
  /**
   * Runs after materialization, before the first network call. May mutate
   * the wire request. Cannot cancel the call.
   */
  onBeforeSend?(request: WireRequest): void;

  /**
   * Runs once per execution after the last attempt, whether it succeeded or
   * not. Returning `true` asks to stop: later hooks are skipped and a
   * sequential Group ends its stream after delivering this result.
   */
  onAfterResponse?(
    request: LogicalRequest,
    response: HttpResponse | undefined,
    error: RequestError | undefined
  ): boolean | void;
}

export type BeforeSendFn = NonNullable<RequestHook["onBeforeSend"]>;
export type AfterResponseFn = NonNullable<RequestHook["onAfterResponse"]>;
