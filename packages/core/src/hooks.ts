import type { RequestError } from "./errors";
import type LogicalRequest from "./logical-request";
import type {
  AfterResponseFn,
  BeforeSendFn,
  RequestHook,
} from "./models/hooks";
import type { WireRequest } from "./models/request-params";
import type HttpResponse from "./response";

/**
 * Hook lists in dispatch order: shared scope, then request scope.
 */
export type HookScopes = readonly (readonly RequestHook[])[];

export function beforeSend(fn: BeforeSendFn): RequestHook {
  return { onBeforeSend: fn };
}

export function afterResponse(fn: AfterResponseFn): RequestHook {
  return { onAfterResponse: fn };
}

export function runBeforeSend(scopes: HookScopes, request: WireRequest): void {
  for (const hooks of scopes) {
    for (const hook of hooks) {
      hook.onBeforeSend?.(request);
    }
  }
}

/**
 * Runs post-response hooks until one returns `true`.
 *
 * @returns Whether a hook asked to stop
 */
export function runAfterResponse(
  scopes: HookScopes,
  request: LogicalRequest,
  response: HttpResponse | undefined,
  error: RequestError | undefined
): boolean {
  for (const hooks of scopes) {
    for (const hook of hooks) {
      if (hook.onAfterResponse?.(request, response, error) === true) {
        return true;
      }
    }
  }
  return false;
}
