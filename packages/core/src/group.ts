import { defaultLogger, type Logger } from "./logger";
import type LogicalRequest from "./logical-request";
import type { ResultEnvelope } from "./models/envelope";
import Channel, { type ReadableChannel } from "./utils/channel";
import StepGate from "./utils/step-gate";

export interface GroupOptions {
  logger?: Logger;
}

/**
 * Runs a fixed list of requests either one at a time, gated by the
 * consumer, or all at once with results streamed back as they complete.
 *
 * Each mode has at most one active stream; asking for a mode that is
 * already running returns the running stream. Once a stream finishes it is
 * closed and forgotten, and the next call starts a fresh run.
 *
 * @example
 * ```typescript
 * const group = new Group([api.get("/a"), api.get("/b"), api.get("/c")]);
 *
 * for await (const result of group.sequentialStream()) {
 *   if (!result.ok) {
 *     group.stop();
 *     continue;
 *   }
 *   group.continue();
 * }
 *
 * for await (const result of group.parallelStream()) {
 *   console.log(result.request.uri, result.ok);
 * }
 * ```
 */
export default class Group {
  private readonly requests: readonly LogicalRequest[];
  private readonly logger: Logger;
  private sequential?: Channel<ResultEnvelope>;
  private parallel?: Channel<ResultEnvelope>;
  private gate?: StepGate;
  private halted = false;

  constructor(requests: readonly LogicalRequest[], options: GroupOptions = {}) {
    this.requests = [...requests];
    this.logger = options.logger ?? defaultLogger;
  }

  public get size(): number {
    return this.requests.length;
  }

  //  #region Sequential mode

  /**
   * Releases the sequential stream to the next request. No-op when no
   * delivery is waiting.
   */
  public continue(): void {
    this.gate?.proceed();
  }

  /**
   * Ends the sequential stream. A request already on the wire still
   * completes, but its result is not delivered and nothing after it starts.
   */
  public stop(): void {
    if (this.sequential) {
      this.halted = true;
    }
    this.gate?.stop();
  }

  /**
   * Executes the requests in order, delivering one result at a time. The
   * next request starts only after `continue()`; `stop()` closes the stream.
   * A post-response hook returning `true` closes the stream right after its
   * result is delivered.
   */
  public sequentialStream(): ReadableChannel<ResultEnvelope> {
    if (this.sequential) {
      return this.sequential;
    }
    const channel = new Channel<ResultEnvelope>();
    this.sequential = channel;
    this.runSequential(channel).catch((error: unknown) => {
      this.logger.error({ err: error }, "sequential stream aborted");
    });
    return channel;
  }

  private async runSequential(channel: Channel<ResultEnvelope>): Promise<void> {
    this.halted = false;
    this.logger.debug({ size: this.size }, "sequential stream started");
    try {
      for (const request of this.requests) {
        if (this.halted) {
          return;
        }
        const envelope = await request.execute();
        if (this.halted) {
          return;
        }

        const gate = new StepGate();
        this.gate = gate;
        const delivered = await Promise.race([
          channel.send(envelope).then(() => true),
          gate.stopped().then(() => false),
        ]);
        if (!delivered) {
          return;
        }

        if (envelope.haltRequested) {
          this.logger.debug(
            { uri: request.uri },
            "hook requested stop, closing sequential stream"
          );
          return;
        }
        if (this.halted || (await gate.wait()) === "stop") {
          return;
        }
      }
    } finally {
      this.gate = undefined;
      this.sequential = undefined;
      channel.close();
      this.logger.debug("sequential stream finished");
    }
  }

  //  #endregion

  //  #region Parallel mode

  /**
   * Starts every request at once. Results arrive in completion order and
   * the stream closes after the last one; one failure never cancels the
   * others. Hook stop requests are ignored in this mode.
   */
  public parallelStream(): ReadableChannel<ResultEnvelope> {
    if (this.parallel) {
      return this.parallel;
    }
    const channel = new Channel<ResultEnvelope>(this.requests.length);
    this.parallel = channel;
    this.runParallel(channel).catch((error: unknown) => {
      this.logger.error({ err: error }, "parallel stream aborted");
    });
    return channel;
  }

  private async runParallel(channel: Channel<ResultEnvelope>): Promise<void> {
    this.logger.debug({ size: this.size }, "parallel stream started");
    try {
      const workers = this.requests.map(async (request) => {
        const envelope = await request.execute();
        await channel.send(envelope);
      });
      const outcomes = await Promise.allSettled(workers);
      for (const outcome of outcomes) {
        if (outcome.status === "rejected") {
          this.logger.error({ err: outcome.reason }, "request worker failed");
        }
      }
    } finally {
      this.parallel = undefined;
      channel.close();
      this.logger.debug("parallel stream finished");
    }
  }

  //  #endregion
}
