import { describe, it, expect, vi } from "vitest";
import { CancellationTokenSource, Mutex, mapConcurrent, retry, sleep, timeout } from "../async.js";

describe("retry", () => {
  it("should return the first successful attempt", async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error("flaky")).mockResolvedValueOnce("ok");

    expect(await retry(fn, { initialDelayMs: 0 })).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("should back off exponentially up to the cap", async () => {
    const error = new Error("down");
    const onRetry = vi.fn();

    await expect(
      retry(() => Promise.reject(error), { maxAttempts: 3, initialDelayMs: 10, maxDelayMs: 15, backoffFactor: 2, onRetry })
    ).rejects.toBe(error);
    expect(onRetry.mock.calls).toEqual([
      [error, 1, 10],
      [error, 2, 15],
    ]);
  });

  it("should stop at errors retryIf rejects", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("fatal"));

    await expect(retry(fn, { initialDelayMs: 0, retryIf: () => false })).rejects.toThrow("fatal");
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe("timeout", () => {
  it("should reject with the factory's error when the promise is too slow", async () => {
    await expect(timeout(sleep(50), 5, () => new RangeError("slow"))).rejects.toThrow(RangeError);
  });

  it("should pass through results that arrive in time", async () => {
    expect(await timeout(Promise.resolve(7), 50)).toBe(7);
  });
});

describe("Mutex", () => {
  it("should run critical sections one at a time in arrival order", async () => {
    const mutex = new Mutex();
    const events: string[] = [];
    const section = (name: string, ms: number) =>
      mutex.runExclusive(async () => {
        events.push(`${name}:start`);
        await sleep(ms);
        events.push(`${name}:end`);
      });

    await Promise.all([section("a", 10), section("b", 0)]);

    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end"]);
    expect(mutex.locked).toBe(false);
  });

  it("should release the lock when the section throws", async () => {
    const mutex = new Mutex();

    await expect(mutex.runExclusive(() => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    expect(await mutex.runExclusive(async () => "next")).toBe("next");
  });
});

describe("CancellationTokenSource", () => {
  it("should keep the first cancellation reason", () => {
    const source = new CancellationTokenSource();
    source.cancel("first");
    source.cancel("second");

    expect(source.token.cancelled).toBe(true);
    expect(source.token.reason).toBe("first");
  });
});

describe("mapConcurrent", () => {
  it("should keep input order and respect the concurrency limit", async () => {
    let active = 0;
    let peak = 0;

    const results = await mapConcurrent(
      [30, 10, 20, 0],
      async (ms, index) => {
        active++;
        peak = Math.max(peak, active);
        await sleep(ms);
        active--;
        return index * 2;
      },
      2
    );

    expect(results).toEqual([0, 2, 4, 6]);
    expect(peak).toBe(2);
  });

  it("should stop taking items after a failure and wait for in-flight work", async () => {
    const started: number[] = [];
    const finished: number[] = [];
    const error = new Error("write failed");

    await expect(
      mapConcurrent(
        [0, 1, 2, 3, 4, 5],
        async (item) => {
          started.push(item);
          if (item === 0) throw error;
          await sleep(5);
          finished.push(item);
          return item;
        },
        2
      )
    ).rejects.toBe(error);

    expect(started).toEqual([0, 1]);
    expect(finished).toEqual([1]);
  });
});
