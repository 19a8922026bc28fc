import { Transport } from "../../index";
import type { TransportResponse, WireRequest } from "../../index";

export interface ScriptedReply {
  status?: number;
  statusText?: string;
  headers?: Record<string, string>;
  body?: string;
  /** Milliseconds to wait before answering */
  delayMs?: number;
}

export type ScriptedStep = ScriptedReply | Error;

export type StepHandler = (request: WireRequest, call: number) => ScriptedStep;

export interface RecordedCall {
  method: string;
  url: string;
  headers: Record<string, string>;
  wire: WireRequest;
}

const encoder = new TextEncoder();

function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * In-process transport driven by a script. Queued steps are consumed first,
 * then the handler decides, then a plain 200 is returned.
 */
export default class TestTransport extends Transport<ScriptedReply> {
  public readonly calls: RecordedCall[] = [];
  public bodyReads = 0;
  public inFlight = 0;
  public maxInFlight = 0;

  private readonly queue: ScriptedStep[] = [];

  constructor(private readonly handler?: StepHandler) {
    super();
  }

  public reply(reply: ScriptedReply = {}): this {
    this.queue.push(reply);
    return this;
  }

  public fail(error: Error = new TypeError("socket hang up"), times = 1): this {
    for (let i = 0; i < times; i++) {
      this.queue.push(error);
    }
    return this;
  }

  public async createRequest(request: WireRequest): Promise<ScriptedReply> {
    this.calls.push({
      method: request.method,
      url: request.url.href,
      headers: Object.fromEntries(request.headers),
      wire: request,
    });
    const step =
      this.queue.shift() ?? this.handler?.(request, this.calls.length) ?? {};

    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (step instanceof Error) {
        throw step;
      }
      if (step.delayMs !== undefined) {
        await wait(step.delayMs);
      }
      return step;
    } finally {
      this.inFlight--;
    }
  }

  public getResult(reply: ScriptedReply): TransportResponse {
    return {
      status: reply.status ?? 200,
      statusText: reply.statusText ?? "OK",
      headers: new Headers(reply.headers),
      readBody: async () => {
        this.bodyReads++;
        return encoder.encode(reply.body ?? "");
      },
    };
  }
}
