import {
  resolveServiceConfig,
  type ServiceConfig,
  type ServiceConfigInput,
} from "./config";
import { ConfigurationError } from "./errors";
import Executor from "./executor";
import { afterResponse, beforeSend } from "./hooks";
import { defaultLogger, type Logger } from "./logger";
import LogicalRequest from "./logical-request";
import type {
  AfterResponseFn,
  BeforeSendFn,
  RequestHook,
} from "./models/hooks";
import type { HttpMethod } from "./models/request-params";
import type Transport from "./transport";

/**
 * A configured API endpoint: base host, named paths, default headers and
 * shared-scope hooks. Every request it creates shares its transport,
 * configuration, logger and hook list.
 *
 * @example
 * ```typescript
 * const api = new Service(new FetchTransport(), { timeoutMs: 5000 })
 *   .withHost("https://api.example.com")
 *   .paths("listUsers", "/users", "getUser", "/users/1")
 *   .header("Accept", "application/json");
 *
 * const result = await api.method("GET", "listUsers").execute();
 * ```
 */
export default class Service {
  public readonly config: ServiceConfig;
  public readonly logger: Logger;

  private readonly transport: Transport;
  private readonly executor: Executor;
  private readonly defaultHeaders = new Headers();
  private readonly namedPaths = new Map<string, string>();
  private readonly hooks: RequestHook[] = [];
  private host = "";

  constructor(
    transport: Transport,
    config?: ServiceConfigInput,
    logger: Logger = defaultLogger
  ) {
    this.transport = transport;
    this.config = resolveServiceConfig(config);
    this.logger = logger;
    this.executor = new Executor({ logger });
  }

  /** Prefix prepended to every request URI */
  public withHost(host: string): this {
    this.host = host;
    return this;
  }

  /**
   * Registers named paths given as key/path pairs.
   *
   * @throws {ConfigurationError} If an odd number of arguments is passed
   */
  public paths(...keyAndPath: string[]): this {
    if (keyAndPath.length % 2 !== 0) {
      throw new ConfigurationError("paths must be key/path pairs");
    }
    for (let i = 0; i < keyAndPath.length; i += 2) {
      this.namedPaths.set(keyAndPath[i], keyAndPath[i + 1]);
    }
    return this;
  }

  public header(name: string, value: string): this {
    this.defaultHeaders.append(name, value);
    return this;
  }

  public rawHeader(name: string, value: string): this {
    this.defaultHeaders.set(name, value);
    return this;
  }

  public use(...hooks: RequestHook[]): this {
    this.hooks.push(...hooks);
    return this;
  }

  public beforeSend(...fns: BeforeSendFn[]): this {
    return this.use(...fns.map(beforeSend));
  }

  public afterResponse(...fns: AfterResponseFn[]): this {
    return this.use(...fns.map(afterResponse));
  }

  /**
   * Creates a request for a path registered with `paths()`.
   *
   * @throws {ConfigurationError} If the key was never registered
   */
  public method(method: HttpMethod, pathKey: string): LogicalRequest {
    const path = this.namedPaths.get(pathKey);
    if (path === undefined) {
      throw new ConfigurationError(`Path "${pathKey}" is not registered`);
    }
    return this.request(method, path);
  }

  public request(method: HttpMethod, uri: string): LogicalRequest {
    return new LogicalRequest({
      method,
      uri: this.host + uri,
      transport: this.transport,
      headers: this.defaultHeaders,
      config: this.config,
      sharedHooks: this.hooks,
      executor: this.executor,
    });
  }

  public get(uri: string): LogicalRequest {
    return this.request("GET", uri);
  }

  public post(uri: string): LogicalRequest {
    return this.request("POST", uri);
  }

  /** Joins the segments with "/" into the request URI */
  public rest(method: HttpMethod, ...segments: string[]): LogicalRequest {
    return this.request(method, segments.join("/"));
  }
}
