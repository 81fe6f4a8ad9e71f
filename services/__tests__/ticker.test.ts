import { afterEach, describe, test, expect, vi } from "vitest";
import { Ticker, type TickerClock } from "../ticker";

// Clock whose time only moves when work or sleep advances it.
function fakeClock() {
  let now = 0;
  const sleeps: number[] = [];
  const clock: TickerClock = {
    now: () => now,
    sleep: async (ms) => {
      sleeps.push(ms);
      now += ms;
    },
  };
  return {
    clock,
    sleeps,
    advance: (ms: number) => {
      now += ms;
    },
    time: () => now,
  };
}

afterEach(() => {
  vi.restoreAllMocks();
  vi.useRealTimers();
});

describe("Ticker", () => {
  test("sleeps for the interval minus the time the work took", async () => {
    const { clock, sleeps, advance } = fakeClock();
    const ticker = new Ticker(30000, clock);
    const durations = [1000, 5000, 29000];

    await ticker.run(async (tick) => {
      advance(durations[tick]);
      if (tick === durations.length - 1) ticker.stop();
    });

    expect(sleeps).toEqual([29000, 25000]);
  });

  test("ticks start on the fixed cadence regardless of work duration", async () => {
    const { clock, advance, time } = fakeClock();
    const ticker = new Ticker(30000, clock);
    const starts: number[] = [];

    await ticker.run(async (tick) => {
      starts.push(time());
      advance(tick % 2 === 0 ? 2500 : 17000);
      if (tick === 4) ticker.stop();
    });

    expect(starts).toEqual([0, 30000, 60000, 90000, 120000]);
  });

  test("an overrun sleeps 0, logs a warning, and does not accumulate", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const { clock, sleeps, advance, time } = fakeClock();
    const ticker = new Ticker(30000, clock);
    const durations = [1000, 45000, 1000, 1000];
    const starts: number[] = [];

    await ticker.run(async (tick) => {
      starts.push(time());
      advance(durations[tick]);
      if (tick === durations.length - 1) ticker.stop();
    });

    expect(sleeps).toEqual([29000, 0, 29000]);
    // Later ticks are shifted by the single 15s overrun only.
    expect(starts).toEqual([0, 30000, 75000, 105000]);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      "[ticker]",
      "Iteration took 45000ms, longer than the 30000ms interval"
    );
  });

  test("a failing tick is logged and the loop keeps going", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const { clock } = fakeClock();
    const ticker = new Ticker(1000, clock);
    const seen: number[] = [];

    await ticker.run(async (tick) => {
      seen.push(tick);
      if (tick === 0) throw new Error("boom");
      ticker.stop();
    });

    expect(seen).toEqual([0, 1]);
    expect(error).toHaveBeenCalledTimes(1);
  });

  test("stop() before run() means no tick at all", async () => {
    const { clock } = fakeClock();
    const ticker = new Ticker(1000, clock);
    const work = vi.fn(async () => {});

    ticker.stop();
    await ticker.run(work);

    expect(work).not.toHaveBeenCalled();
    expect(ticker.isRunning).toBe(false);
  });

  test("run() can only be started once", async () => {
    const { clock } = fakeClock();
    const ticker = new Ticker(1000, clock);

    await ticker.run(async () => ticker.stop());

    await expect(ticker.run(async () => {})).rejects.toThrow(
      "Ticker.run() can only be called once per instance"
    );
  });

  test("stop() cuts the default sleep short", async () => {
    vi.useFakeTimers();
    const ticker = new Ticker(60000);
    let ticks = 0;

    const done = ticker.run(async () => {
      ticks++;
    });

    // Let the first tick finish and the sleep begin.
    await vi.advanceTimersByTimeAsync(10);
    expect(ticks).toBe(1);

    ticker.stop();
    await done;

    expect(ticks).toBe(1);
  });
});
