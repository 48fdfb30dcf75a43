/**
 * Update scheduler.
 *
 * Runs one cycle before start() resolves, then one per interval until
 * stop(). At most one cycle is in flight: a tick that fires while the
 * previous cycle is still running is skipped.
 */

import type { Logger } from "pino";

export const DEFAULT_INTERVAL_MS = 60_000;

/**
 * Anything with a cycle to run.
 */
export interface Updatable {
  update(): Promise<unknown>;
}

export interface SchedulerOptions {
  readonly logger: Logger;
  /** Milliseconds between cycles (default: one minute) */
  readonly intervalMs?: number | undefined;
}

export class UpdateScheduler {
  private readonly target: Updatable;
  private readonly logger: Logger;
  private readonly intervalMs: number;

  private timer: ReturnType<typeof setInterval> | undefined;
  private inFlight: Promise<void> | undefined;
  private started = false;
  private stopped = false;
  private _skippedTicks = 0;

  constructor(target: Updatable, options: SchedulerOptions) {
    this.target = target;
    this.logger = options.logger;
    this.intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
  }

  /**
   * Run the first cycle, then arm the interval.
   *
   * @throws {Error} if called twice
   */
  async start(): Promise<void> {
    if (this.started) {
      throw new Error("UpdateScheduler: already started");
    }
    this.started = true;

    await this.runCycle();

    if (this.stopped) return;
    this.timer = setInterval(() => this.tick(), this.intervalMs);
    this.logger.info({ intervalMs: this.intervalMs }, "Update schedule armed");
  }

  /**
   * Disarm the interval and wait for a running cycle to finish.
   */
  async stop(): Promise<void> {
    this.stopped = true;
    if (this.timer !== undefined) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    await this.inFlight;
  }

  isRunning(): boolean {
    return this.timer !== undefined;
  }

  get skippedTicks(): number {
    return this._skippedTicks;
  }

  private tick(): void {
    if (this.inFlight !== undefined) {
      this._skippedTicks++;
      this.logger.warn(
        { skippedTicks: this._skippedTicks },
        "Previous update still running; skipping tick",
      );
      return;
    }
    void this.runCycle();
  }

  private runCycle(): Promise<void> {
    const cycle = this.target
      .update()
      .then(
        () => undefined,
        (err: unknown) => {
          this.logger.error({ err }, "Update cycle threw");
        },
      )
      .finally(() => {
        this.inFlight = undefined;
      });
    this.inFlight = cycle;
    return cycle;
  }
}
