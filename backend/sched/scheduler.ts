// sched/scheduler.ts
// Fixed-interval job runner: immediate first run on start(), then one run per tick.
// Single-flight: a tick that arrives while the previous run is still in progress is
// dropped (counted in stats.skipped), never queued and never run in parallel.
// A failing run is recorded and logged; the timer keeps going.

import { errToString } from "../engine/errors";

export type Millis = number;

/** Largest delay setInterval honours; anything above is clamped to 1ms by Node. */
export const MAX_INTERVAL_MS: Millis = 2_147_483_647;

export interface IntervalClock {
  /** Call `fn` every `ms`; returns a function that cancels the timer. */
  every(ms: Millis, fn: () => void): () => void;
}

export const systemClock: IntervalClock = {
  every(ms, fn) {
    const timer = setInterval(fn, ms);
    return () => clearInterval(timer);
  },
};

export interface SchedulerLogger {
  debug(message: string): unknown;
  info(message: string): unknown;
  error(message: string): unknown;
}

export interface JobStats {
  runs: number;
  successes: number;
  failures: number;
  skipped: number;
  lastStartAt?: number;
  lastEndAt?: number;
  lastError?: string;
}

export interface IntervalJobSpec {
  name: string;
  intervalMs: Millis;
  handler: () => Promise<unknown>;
  runOnStart?: boolean;        // default true
  logger?: SchedulerLogger;
  clock?: IntervalClock;
}

const noopLogger: SchedulerLogger = { debug: () => undefined, info: () => undefined, error: () => undefined };

export class IntervalScheduler {
  private readonly spec: IntervalJobSpec;
  private readonly logger: SchedulerLogger;
  private readonly clock: IntervalClock;
  private cancelTimer: (() => void) | null = null;
  private inFlight: Promise<void> | null = null;
  private readonly counters: JobStats = { runs: 0, successes: 0, failures: 0, skipped: 0 };

  constructor(spec: IntervalJobSpec) {
    if (!Number.isFinite(spec.intervalMs) || spec.intervalMs <= 0 || spec.intervalMs > MAX_INTERVAL_MS) {
      throw new RangeError(`"${spec.name}" requires 0 < intervalMs <= ${MAX_INTERVAL_MS}`);
    }
    this.spec = spec;
    this.logger = spec.logger ?? noopLogger;
    this.clock = spec.clock ?? systemClock;
  }

  /** Arm the timer. Calling start() on a started scheduler is a no-op. */
  start(): void {
    if (this.cancelTimer) return;
    this.cancelTimer = this.clock.every(this.spec.intervalMs, () => {
      void this.trigger();
    });
    this.logger.info(`Scheduler "${this.spec.name}" started (every ${this.spec.intervalMs}ms)`);
    if (this.spec.runOnStart !== false) void this.trigger();
  }

  /**
   * Cancel the timer, then wait for the in-flight run (if any) to finish.
   * A run is never aborted midway.
   */
  async stop(): Promise<void> {
    if (this.cancelTimer) {
      this.cancelTimer();
      this.cancelTimer = null;
      this.logger.info(`Scheduler "${this.spec.name}" stopped`);
    }
    if (this.inFlight) await this.inFlight;
  }

  /** Run immediately through the same single-flight gate. Resolves false if skipped. */
  runNow(): Promise<boolean> {
    return this.trigger();
  }

  isStarted(): boolean { return this.cancelTimer !== null; }

  isRunning(): boolean { return this.inFlight !== null; }

  stats(): Readonly<JobStats> {
    return { ...this.counters };
  }

  // ----------------- internals -----------------

  private trigger(): Promise<boolean> {
    if (this.inFlight) {
      this.counters.skipped++;
      this.logger.debug(`Scheduler "${this.spec.name}": previous run still in progress, tick skipped`);
      return Promise.resolve(false);
    }
    const run = this.execute();
    this.inFlight = run;
    return run.then(() => true);
  }

  private async execute(): Promise<void> {
    this.counters.runs++;
    this.counters.lastStartAt = Date.now();
    try {
      await this.spec.handler();
      this.counters.successes++;
    } catch (e) {
      this.counters.failures++;
      this.counters.lastError = errToString(e);
      this.logger.error(`Scheduler "${this.spec.name}" run failed: ${e instanceof Error && e.stack ? e.stack : this.counters.lastError}`);
    } finally {
      this.counters.lastEndAt = Date.now();
      this.inFlight = null;
    }
  }
}
