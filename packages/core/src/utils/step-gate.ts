export type StepDecision = "continue" | "stop";

/**
 * One-shot pair of "continue" and "stop" signals guarding a single step of
 * a sequential stream. A fresh gate is created for every delivery; firing
 * either signal more than once has no further effect.
 */
export default class StepGate {
  private readonly next = new AbortController();
  private readonly halt = new AbortController();

  public proceed(): void {
    this.next.abort();
  }

  public stop(): void {
    this.halt.abort();
  }

  /** Resolves once `stop()` has fired */
  public stopped(): Promise<void> {
    return new Promise((resolve) => {
      if (this.halt.signal.aborted) {
        resolve();
        return;
      }
      this.halt.signal.addEventListener("abort", () => resolve(), {
        once: true,
      });
    });
  }

  /**
   * Resolves with whichever signal fires first. If both already fired,
   * "stop" wins.
   */
  public wait(): Promise<StepDecision> {
    return new Promise((resolve) => {
      if (this.halt.signal.aborted) {
        resolve("stop");
        return;
      }
      if (this.next.signal.aborted) {
        resolve("continue");
        return;
      }
      this.halt.signal.addEventListener("abort", () => resolve("stop"), {
        once: true,
      });
      this.next.signal.addEventListener("abort", () => resolve("continue"), {
        once: true,
      });
    });
  }
}
