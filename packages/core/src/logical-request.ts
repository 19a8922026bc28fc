import { resolveServiceConfig, type ServiceConfig } from "./config";
import { ConfigurationError, MaterializationError } from "./errors";
import Executor from "./executor";
import { afterResponse, beforeSend, type HookScopes } from "./hooks";
import type { ResultEnvelope } from "./models/envelope";
import type {
  AfterResponseFn,
  BeforeSendFn,
  RequestHook,
} from "./models/hooks";
import type {
  HttpMethod,
  RequestBody,
  WireRequest,
} from "./models/request-params";
import type Transport from "./transport";
import { SSRFError, validateUrl } from "./utils/url-validator";

// RFC 9110 token
const METHOD_TOKEN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

export interface LogicalRequestInit {
  method?: HttpMethod;
  uri: string;
  transport: Transport;
  headers?: Headers;
  config?: ServiceConfig;
  /** Shared-scope hooks, held by reference */
  sharedHooks?: readonly RequestHook[];
  executor?: Executor;
}

/**
 * Declarative description of one HTTP call. Configure it through the
 * chained mutators, then run it with `execute()` or hand it to a Group.
 *
 * The wire request is built once and reused by every later execution, so
 * builder calls made after the first execution have no effect on the wire.
 * One instance must not be executed concurrently.
 *
 * @example
 * ```typescript
 * const request = new LogicalRequest({ method: "GET", uri: "https://api.example.com/users", transport })
 *   .params("page", "2")
 *   .header("Accept", "application/json")
 *   .retryDelay(200, 1000);
 *
 * const result = await request.execute();
 * ```
 */
export default class LogicalRequest {
  public readonly method: HttpMethod;
  public readonly uri: string;
  public readonly transport: Transport;
  public readonly config: ServiceConfig;

  /** Set right before the first network call of the latest execution */
  public startedAt?: Date;
  /** Set after the last attempt of the latest execution */
  public endedAt?: Date;

  private readonly headers: Headers;
  private readonly query = new URLSearchParams();
  private readonly sharedHooks: readonly RequestHook[];
  private readonly ownHooks: RequestHook[] = [];
  private readonly executor: Executor;
  private retries: readonly number[] = [];
  private data?: RequestBody;
  private wire?: WireRequest;

  constructor(init: LogicalRequestInit) {
    this.method = init.method ?? "";
    this.uri = init.uri;
    this.transport = init.transport;
    this.config = init.config ?? resolveServiceConfig();
    this.headers = new Headers(init.headers);
    this.sharedHooks = init.sharedHooks ?? [];
    this.executor = init.executor ?? new Executor();
  }

  //  #region Builder

  /**
   * Sets the delays, in milliseconds, slept before each retry. One retry
   * per entry; an empty list disables retries.
   */
  public retryDelay(...delaysMs: number[]): this {
    for (const delay of delaysMs) {
      if (!Number.isFinite(delay) || delay < 0) {
        throw new ConfigurationError(`Invalid retry delay: ${delay}`);
      }
    }
    this.retries = [...delaysMs];
    return this;
  }

  /**
   * Appends query parameters given as key/value pairs.
   *
   * @throws {ConfigurationError} If an odd number of arguments is passed
   */
  public params(...pairs: string[]): this {
    if (pairs.length % 2 !== 0) {
      throw new ConfigurationError("params must be key/value pairs");
    }
    for (let i = 0; i < pairs.length; i += 2) {
      this.query.append(pairs[i], pairs[i + 1]);
    }
    return this;
  }

  /** Adds a header value, keeping existing values */
  public header(name: string, value: string): this {
    this.headers.append(name, value);
    return this;
  }

  /** Sets a header, replacing existing values */
  public rawHeader(name: string, value: string): this {
    this.headers.set(name, value);
    return this;
  }

  public body(data: RequestBody): this {
    this.data = data;
    return this;
  }

  /** Adds request-scope hooks; they run after the shared-scope ones */
  public use(...hooks: RequestHook[]): this {
    this.ownHooks.push(...hooks);
    return this;
  }

  public beforeSend(...fns: BeforeSendFn[]): this {
    return this.use(...fns.map(beforeSend));
  }

  public afterResponse(...fns: AfterResponseFn[]): this {
    return this.use(...fns.map(afterResponse));
  }

  //  #endregion

  //  #region Execution

  public get retryDelays(): readonly number[] {
    return this.retries;
  }

  public get hookScopes(): HookScopes {
    return [this.sharedHooks, this.ownHooks];
  }

  /** The materialized wire request, if `materialize()` has succeeded */
  public get wireRequest(): WireRequest | undefined {
    return this.wire;
  }

  /** Duration of the latest execution, end minus start */
  public get elapsedMs(): number | undefined {
    if (!this.startedAt || !this.endedAt) {
      return undefined;
    }
    return this.endedAt.getTime() - this.startedAt.getTime();
  }

  /**
   * Builds the wire request on first call and returns the same object on
   * every later call.
   *
   * @throws {MaterializationError} If the method, URI or body is unusable
   */
  public materialize(): WireRequest {
    if (this.wire) {
      return this.wire;
    }

    const method = this.method === "" ? "GET" : this.method;
    if (!METHOD_TOKEN.test(method)) {
      throw new MaterializationError(`Invalid HTTP method "${method}"`);
    }

    let url: URL;
    try {
      url = new URL(this.uri);
    } catch (error) {
      throw new MaterializationError(`Invalid URI "${this.uri}"`, {
        cause: error,
      });
    }

    try {
      validateUrl(url, this.config.urlValidation);
    } catch (error) {
      if (error instanceof SSRFError) {
        throw new MaterializationError(
          `URI "${this.uri}" rejected: ${error.message}`,
          { cause: error }
        );
      }
      throw error;
    }

    this.query.forEach((value, key) => {
      url.searchParams.append(key, value);
    });

    const headers = new Headers(this.headers);
    const wire: WireRequest = {
      method,
      url,
      headers,
      timeoutMs: this.config.timeoutMs,
    };

    if (this.data !== undefined) {
      if (typeof this.data === "string" || this.data instanceof Uint8Array) {
        wire.body = this.data;
      } else {
        try {
          wire.body = JSON.stringify(this.data);
        } catch (error) {
          throw new MaterializationError(
            `Body of ${method} ${this.uri} cannot be encoded as JSON`,
            { cause: error }
          );
        }
        if (!headers.has("content-type")) {
          headers.set("content-type", "application/json");
        }
      }
    }

    this.wire = wire;
    return wire;
  }

  public execute(): Promise<ResultEnvelope> {
    return this.executor.execute(this);
  }

  //  #endregion
}
