import {
  HookError,
  MaterializationError,
  TransportError,
  type RequestError,
} from "./errors";
import { runAfterResponse, runBeforeSend } from "./hooks";
import { defaultLogger, type Logger } from "./logger";
import type LogicalRequest from "./logical-request";
import type { ResultEnvelope } from "./models/envelope";
import type { WireRequest } from "./models/request-params";
import HttpResponse from "./response";
import type { TransportResponse } from "./transport";

/**
 * Sleeps for the specified number of milliseconds.
 *
 * @param ms - Milliseconds to sleep
 * @returns A promise that resolves after the delay
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function failed(
  request: LogicalRequest,
  error: RequestError,
  haltRequested: boolean
): ResultEnvelope {
  return { ok: false, request, response: undefined, error, haltRequested };
}

export interface ExecutorOptions {
  logger?: Logger;
  /** Replaces the timer used between retries (tests pass a recorder) */
  sleep?: (ms: number) => Promise<void>;
}

function toTransportError(error: unknown, wire: WireRequest): TransportError {
  if (error instanceof TransportError) {
    return error;
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new TransportError(
    `${wire.method} ${wire.url.href} failed: ${reason}`,
    { cause: error }
  );
}

/**
 * Runs one LogicalRequest end to end: materialize, pre-send hooks, network
 * call with fixed-delay retries, timestamps, post-response hooks.
 *
 * Request failures never reject; they come back in the envelope. A hook
 * that throws turns the result into a `HookError` failure.
 *
 * @example
 * ```typescript
 * const executor = new Executor({ logger });
 * const result = await executor.execute(service.get("/users").retryDelay(100, 500));
 * if (result.ok) {
 *   console.log(await result.response.json());
 * }
 * ```
 */
export default class Executor {
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: ExecutorOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
    this.sleep = options.sleep ?? sleep;
  }

  public async execute(request: LogicalRequest): Promise<ResultEnvelope> {
    let wire: WireRequest;
    try {
      wire = request.materialize();
    } catch (error) {
      const failure =
        error instanceof MaterializationError
          ? error
          : new MaterializationError(
              `${request.method || "GET"} ${request.uri} could not be materialized`,
              { cause: error }
            );
      this.logger.error(
        { err: failure, method: request.method, uri: request.uri },
        "request could not be materialized"
      );
      return failed(request, failure, false);
    }

    const scopes = request.hookScopes;
    try {
      runBeforeSend(scopes, wire);
    } catch (error) {
      return failed(request, this.hookFailure("beforeSend", wire, error), false);
    }

    request.startedAt = new Date();
    let outcome: HttpResponse | TransportError;
    try {
      outcome = new HttpResponse(
        request,
        wire,
        await this.sendWithRetry(request, wire)
      );
    } catch (error) {
      outcome = toTransportError(error, wire);
      this.logger.error(
        { err: outcome, attempts: outcome.attempts, url: wire.url.href },
        "request failed"
      );
    }
    request.endedAt = new Date();

    let haltRequested: boolean;
    try {
      haltRequested =
        outcome instanceof HttpResponse
          ? runAfterResponse(scopes, request, outcome, undefined)
          : runAfterResponse(scopes, request, undefined, outcome);
    } catch (error) {
      return failed(request, this.hookFailure("afterResponse", wire, error), false);
    }

    if (outcome instanceof TransportError) {
      return failed(request, outcome, haltRequested);
    }
    if (request.config.debug) {
      await this.logDump(outcome);
    }
    return { ok: true, request, response: outcome, error: undefined, haltRequested };
  }

  /**
   * Calls the transport once, then once more after each configured delay
   * until a call succeeds.
   *
   * @throws {TransportError} The last failure, with `attempts` set
   */
  private async sendWithRetry(
    request: LogicalRequest,
    wire: WireRequest
  ): Promise<TransportResponse> {
    const delays = request.retryDelays;

    for (let attempt = 0; ; attempt++) {
      try {
        this.logger.debug(
          { method: wire.method, url: wire.url.href, attempt: attempt + 1 },
          "sending request"
        );
        return await request.transport.executeRequest(wire);
      } catch (error) {
        const failure = toTransportError(error, wire);
        failure.attempts = attempt + 1;
        if (attempt >= delays.length) {
          throw failure;
        }
        const delay = delays[attempt];
        this.logger.warn(
          { url: wire.url.href, attempt: attempt + 1, delayMs: delay, err: failure },
          "retrying request"
        );
        await this.sleep(delay);
      }
    }
  }

  private hookFailure(
    phase: "beforeSend" | "afterResponse",
    wire: WireRequest,
    error: unknown
  ): HookError {
    const reason = error instanceof Error ? error.message : String(error);
    const failure = new HookError(
      `${phase} hook failed for ${wire.method} ${wire.url.href}: ${reason}`,
      { cause: error }
    );
    this.logger.error({ err: failure, url: wire.url.href }, "hook failed");
    return failure;
  }

  private async logDump(response: HttpResponse): Promise<void> {
    try {
      this.logger.debug({ dump: await response.dump() }, "request exchange");
    } catch (error) {
      this.logger.warn(
        { err: error, url: response.wire.url.href },
        "could not dump request exchange"
      );
    }
  }
}
