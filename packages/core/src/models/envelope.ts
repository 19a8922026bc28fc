import type { RequestError } from "../errors";
import type LogicalRequest from "../logical-request";
import type HttpResponse from "../response";

interface EnvelopeBase {
  /** The logical request this result belongs to */
  request: LogicalRequest;
  /** A post-response hook returned `true` */
  haltRequested: boolean;
}

export interface SuccessEnvelope extends EnvelopeBase {
  ok: true;
  response: HttpResponse;
  error: undefined;
}

export interface FailureEnvelope extends EnvelopeBase {
  ok: false;
  response: undefined;
  error: RequestError;
}

/**
 * Outcome of one execution: a response or an error, never both.
 */
export type ResultEnvelope = SuccessEnvelope | FailureEnvelope;
