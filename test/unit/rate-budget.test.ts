import { describe, it, expect } from "vitest";
import { RateBudget, RateGate } from "../../src/sources/rate-budget.js";
import { RateLimitedError } from "../../src/utils/errors.js";
import { silentLogger } from "../helpers/fixtures.js";

function fakeClock() {
  const clock: { now: number; sleeps: number[] } = { now: 0, sleeps: [] };
  const sleep = async (ms: number) => {
    clock.sleeps.push(ms);
    clock.now += ms;
  };
  return { clock, now: () => clock.now, sleep };
}

describe("RateBudget", () => {
  it("allows requests up to the limit, then asks to wait for the window", () => {
    const { now } = fakeClock();
    const budget = new RateBudget({ maxRequests: 2, windowMs: 1000 }, now);

    expect(budget.waitTime()).toBe(0);
    budget.hit();
    expect(budget.waitTime()).toBe(0);
    budget.hit();
    expect(budget.waitTime()).toBe(1000);
    expect(budget.used).toBe(2);
  });

  it("frees capacity as the window slides", () => {
    const { clock, now } = fakeClock();
    const budget = new RateBudget({ maxRequests: 2, windowMs: 1000 }, now);

    budget.hit();
    clock.now = 400;
    budget.hit();
    clock.now = 600;
    expect(budget.waitTime()).toBe(400);
    clock.now = 1000;
    expect(budget.waitTime()).toBe(0);
    expect(budget.used).toBe(1);
  });

  it("stays exhausted until a platform reset time", () => {
    const { clock, now } = fakeClock();
    const budget = new RateBudget({ maxRequests: 100, windowMs: 1000 }, now);

    budget.blockUntil(5000);
    expect(budget.waitTime()).toBe(5000);
    clock.now = 5000;
    expect(budget.waitTime()).toBe(0);
  });
});

describe("RateGate", () => {
  it("sleeps until the budget allows the next call", async () => {
    const { clock, now, sleep } = fakeClock();
    const gate = new RateGate(new RateBudget({ maxRequests: 1, windowMs: 1000 }, now), sleep, silentLogger());

    await gate.run("first", async () => "a");
    const second = await gate.run("second", async () => "b");

    expect(second).toBe("b");
    expect(clock.sleeps).toEqual([1000]);
  });

  it("retries the same call after the platform resets", async () => {
    const { clock, now, sleep } = fakeClock();
    const gate = new RateGate(new RateBudget({ maxRequests: 10, windowMs: 1000 }, now), sleep, silentLogger());
    let calls = 0;

    const result = await gate.run("fetch", async () => {
      calls++;
      if (calls === 1) throw new RateLimitedError(3000);
      return "page";
    });

    expect(result).toBe("page");
    expect(calls).toBe(2);
    expect(clock.sleeps).toEqual([3000]);
  });

  it("passes other errors through without retrying", async () => {
    const { now, sleep } = fakeClock();
    const gate = new RateGate(new RateBudget({ maxRequests: 10, windowMs: 1000 }, now), sleep, silentLogger());
    let calls = 0;

    await expect(
      gate.run("fetch", async () => {
        calls++;
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(calls).toBe(1);
  });

  it("gives up after repeated rate-limit responses", async () => {
    const { clock, now, sleep } = fakeClock();
    const gate = new RateGate(new RateBudget({ maxRequests: 10, windowMs: 1000 }, now), sleep, silentLogger(), {
      maxRateLimitRetries: 1,
    });
    let calls = 0;

    await expect(
      gate.run("fetch", async () => {
        calls++;
        throw new RateLimitedError(clock.now + 100);
      }),
    ).rejects.toBeInstanceOf(RateLimitedError);
    expect(calls).toBe(2);
  });
});
