import { describe, it, expect } from "vitest";
import { RateLimiter } from "./rate-limiter.js";

describe("RateLimiter", () => {
  it("allows up to the limit inside one window", () => {
    let t = 0;
    const limiter = new RateLimiter(2, 1000, () => t);

    expect(limiter.check("kira")).toEqual({ allowed: true, remaining: 1, resetAt: 1000 });
    t = 100;
    expect(limiter.check("kira")).toEqual({ allowed: true, remaining: 0, resetAt: 1000 });
    t = 200;
    expect(limiter.check("kira")).toEqual({ allowed: false, remaining: 0, resetAt: 1000 });
  });

  it("slides the window call by call", () => {
    let t = 0;
    const limiter = new RateLimiter(2, 1000, () => t);
    limiter.check("kira");
    t = 100;
    limiter.check("kira");

    t = 1000;
    expect(limiter.check("kira")).toEqual({ allowed: true, remaining: 0, resetAt: 1100 });
  });

  it("counts keys separately", () => {
    const limiter = new RateLimiter(1, 1000, () => 0);
    expect(limiter.check("kira").allowed).toBe(true);
    expect(limiter.check("brute").allowed).toBe(true);
    expect(limiter.check("kira").allowed).toBe(false);
  });

  it("prunes expired keys", () => {
    let t = 0;
    const limiter = new RateLimiter(5, 1000, () => t);
    limiter.check("kira");
    t = 500;
    limiter.check("brute");

    t = 1200;
    limiter.prune();
    expect(limiter.size).toBe(1);
    t = 5000;
    limiter.prune();
    expect(limiter.size).toBe(0);
  });

  it("drops idle keys while checking once a window has passed", () => {
    let t = 0;
    const limiter = new RateLimiter(5, 1000, () => t);
    limiter.check("kira");
    t = 500;
    limiter.check("brute");
    expect(limiter.size).toBe(2);

    t = 900;
    limiter.check("scout");
    expect(limiter.size).toBe(3);

    t = 2000;
    limiter.check("scout");
    expect(limiter.size).toBe(1);
  });
});
