import { errorMessage } from "../errors.js";
import { logger as rootLogger, type Logger } from "../observability/logger.js";

export interface SchedulerOptions {
  intervalMs: number;
  runCycle: (signal: AbortSignal) => Promise<unknown>;
  logger?: Logger;
}

/**
 * Repeats a cycle on a fixed interval with chained timers, so two cycles
 * never overlap. A cycle that overruns the interval delays the next tick
 * instead of queueing extra ones.
 */
export class BackgroundScheduler {
  private readonly intervalMs: number;
  private readonly runCycle: (signal: AbortSignal) => Promise<unknown>;
  private readonly log: Logger;
  private readonly abort = new AbortController();
  private timer: NodeJS.Timeout | null = null;
  private current: Promise<void> | null = null;
  private started = false;
  private completedTicks = 0;

  constructor(opts: SchedulerOptions) {
    this.intervalMs = Math.max(0, opts.intervalMs);
    this.runCycle = opts.runCycle;
    this.log = (opts.logger ?? rootLogger).child({ component: "scheduler" });
  }

  get ticks(): number {
    return this.completedTicks;
  }

  get running(): boolean {
    return this.started && !this.abort.signal.aborted;
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    this.log.info({ intervalMs: this.intervalMs }, "background scheduler started");
    this.schedule(0);
  }

  /** Cancels the in-flight cycle and waits for it to settle. */
  async stop(): Promise<void> {
    if (this.abort.signal.aborted) return;
    this.abort.abort();
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.current) await this.current;
    this.log.info({ ticks: this.completedTicks }, "background scheduler stopped");
  }

  private schedule(delayMs: number): void {
    if (this.abort.signal.aborted) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.current = this.tick();
    }, delayMs);
  }

  private async tick(): Promise<void> {
    const startedAt = Date.now();
    try {
      await this.runCycle(this.abort.signal);
    } catch (err) {
      this.log.error({ err: errorMessage(err) }, "background cycle failed");
    }
    this.completedTicks += 1;
    this.current = null;
    this.schedule(Math.max(0, this.intervalMs - (Date.now() - startedAt)));
  }
}
