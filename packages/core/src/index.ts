/**
 * @packageDocumentation
 * @module @stepwire/core
 *
 * Declarative HTTP requests with fixed-delay retries and lifecycle hooks,
 * run one by one or orchestrated as a gated sequential stream or a
 * parallel fan-in stream.
 */

// Main exports
export { default as LogicalRequest } from "./logical-request";
export type { LogicalRequestInit } from "./logical-request";
export { default as Service } from "./service";
export { default as Registry, MapServiceStore } from "./registry";
export type { ServiceStore } from "./registry";
export { default as Executor, sleep } from "./executor";
export type { ExecutorOptions } from "./executor";
export { default as Group } from "./group";
export type { GroupOptions } from "./group";
export { default as HttpResponse } from "./response";
export { default as Transport } from "./transport";
export type { TransportResponse } from "./transport";

// Hooks
export { beforeSend, afterResponse, runBeforeSend, runAfterResponse } from "./hooks";
export type { HookScopes } from "./hooks";
export type {
  RequestHook,
  BeforeSendFn,
  AfterResponseFn,
} from "./models/hooks";

// Types
export type {
  HttpMethod,
  WireRequest,
  RequestBody,
} from "./models/request-params";
export type {
  ResultEnvelope,
  SuccessEnvelope,
  FailureEnvelope,
} from "./models/envelope";

// Errors
export {
  MaterializationError,
  TransportError,
  HookError,
  DecodingError,
  ConfigurationError,
} from "./errors";
export type { RequestError } from "./errors";

// Configuration and logging
export {
  serviceConfigSchema,
  resolveServiceConfig,
  loggerEnvSchema,
  validateLoggerEnv,
} from "./config";
export type {
  ServiceConfig,
  ServiceConfigInput,
  LogLevel,
} from "./config";
export { createLogger, defaultLogger } from "./logger";
export type { Logger } from "./logger";

// Utilities
export { default as Channel } from "./utils/channel";
export type { ReadableChannel } from "./utils/channel";
export { default as StepGate } from "./utils/step-gate";
export type { StepDecision } from "./utils/step-gate";
export { validateUrl, SSRFError } from "./utils/url-validator";
export type { UrlValidationOptions } from "./utils/url-validator";
export { dumpExchange, formatSummary } from "./utils/dump";
