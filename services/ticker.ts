import { createLogger } from "../utils/logger";

const log = createLogger("ticker");

export interface TickerClock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export type TickWork = (tick: number) => Promise<void>;

/**
 * Runs work on a fixed cadence. The time spent inside `work` is subtracted
 * from the following sleep, so slow ticks don't push every later tick back.
 * An overrun sleeps 0 and the next tick starts at once; missed ticks are not
 * made up.
 */
export class Ticker {
  private running = true;
  private started = false;
  private wake: (() => void) | null = null;
  private readonly clock: TickerClock;

  constructor(readonly intervalMs: number, clock?: TickerClock) {
    this.clock = clock ?? {
      now: () => Date.now(),
      sleep: (ms) => this.interruptibleSleep(ms),
    };
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Safe to call from inside a tick. A pending default sleep ends early. */
  stop() {
    this.running = false;
    if (this.wake) {
      this.wake();
    }
  }

  async run(work: TickWork): Promise<void> {
    if (this.started) {
      throw new Error("Ticker.run() can only be called once per instance");
    }
    this.started = true;

    log.debug(`Ticker running every ${this.intervalMs / 1000} seconds`);

    let tick = 0;
    while (this.running) {
      log.debug(`tick ${tick}`);
      const start = this.clock.now();
      try {
        await work(tick);
      } catch (error) {
        log.error(`Tick ${tick} failed:`, error);
      }
      const elapsed = this.clock.now() - start;
      tick++;

      if (!this.running) break;

      let sleepMs = this.intervalMs - elapsed;
      if (sleepMs < 0) {
        log.warn(
          `Iteration took ${elapsed}ms, longer than the ${this.intervalMs}ms interval`
        );
        sleepMs = 0;
      }
      log.debug(`Sleeping for ${sleepMs / 1000} seconds`);
      await this.clock.sleep(sleepMs);
    }

    log.debug(`Ticker stopped after ${tick} ticks`);
  }

  private interruptibleSleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }
}
