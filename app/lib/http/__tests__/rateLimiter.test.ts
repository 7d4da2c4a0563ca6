import { describe, it, expect } from "vitest";
import { RateLimiter } from "../rateLimiter";
import { FakeClock } from "../../__tests__/helpers";

describe("RateLimiter", () => {
  it("grants the first call immediately", async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(1000, clock);

    await limiter.acquire();

    expect(clock.sleeps).toEqual([]);
  });

  it("spaces concurrent callers by the minimum interval, in call order", async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(1000, clock);
    const grants: [string, number][] = [];

    await Promise.all(
      ["a", "b", "c"].map((name) =>
        limiter.acquire().then(() => {
          grants.push([name, clock.now()]);
        }),
      ),
    );

    expect(grants).toEqual([
      ["a", 0],
      ["b", 1000],
      ["c", 2000],
    ]);
    expect(clock.sleeps).toEqual([1000, 1000]);
  });

  it("only waits for the part of the interval that has not passed", async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(1000, clock);

    await limiter.acquire();
    clock.time = 400;
    await limiter.acquire();

    expect(clock.sleeps).toEqual([600]);
  });

  it("does not wait once the interval has passed", async () => {
    const clock = new FakeClock();
    const limiter = new RateLimiter(1000, clock);

    await limiter.acquire();
    clock.time = 5000;
    await limiter.acquire();

    expect(clock.sleeps).toEqual([]);
  });
});
