import { beforeEach, describe, test, expect } from "vitest";
import { Hono } from "hono";
import { rateLimiter, type RateLimitStore } from "../../src/middlewares/rateLimiter";

class MemoryCounterStore implements RateLimitStore {
  readonly counts = new Map<string, number>();
  readonly expiries = new Map<string, number>();
  failing = false;

  async incr(key: string): Promise<number> {
    if (this.failing) throw new Error("redis down");
    const next = (this.counts.get(key) ?? 0) + 1;
    this.counts.set(key, next);
    return next;
  }

  async pexpire(key: string, milliseconds: number): Promise<number> {
    this.expiries.set(key, milliseconds);
    return 1;
  }
}

describe("rateLimiter", () => {
  let store: MemoryCounterStore;
  let app: Hono;

  const hit = (ip: string) =>
    app.fetch(new Request("http://localhost/ping", { headers: { "x-forwarded-for": ip } }));

  beforeEach(() => {
    store = new MemoryCounterStore();
    app = new Hono();
    app.use("*", rateLimiter({ windowMs: 1000, max: 2, keyPrefix: "test", redis: store }));
    app.get("/ping", (c) => c.text("pong"));
  });

  test("allows up to max requests per window, then answers 429", async () => {
    expect((await hit("10.0.0.1")).status).toBe(200);
    expect((await hit("10.0.0.1")).status).toBe(200);

    const limited = await hit("10.0.0.1");
    expect(limited.status).toBe(429);
    expect(await limited.json()).toEqual({
      error: "Too many requests",
      code: "RATE_LIMITED",
      retryable: true,
    });
  });

  test("sets the window expiry on the first hit only", async () => {
    await hit("10.0.0.2");
    await hit("10.0.0.2");
    expect([...store.expiries]).toEqual([["test:10.0.0.2", 1000]]);
  });

  test("counts clients separately", async () => {
    await hit("10.0.0.1");
    await hit("10.0.0.1");
    expect((await hit("10.0.0.3")).status).toBe(200);
  });

  test("fails open when the store errors", async () => {
    store.failing = true;
    for (let i = 0; i < 5; i++) {
      expect((await hit("10.0.0.4")).status).toBe(200);
    }
  });

  test("passes everything through without a store", async () => {
    const open = new Hono();
    open.use("*", rateLimiter({ windowMs: 1000, max: 1, redis: null }));
    open.get("/ping", (c) => c.text("pong"));
    for (let i = 0; i < 3; i++) {
      expect((await open.fetch(new Request("http://localhost/ping"))).status).toBe(200);
    }
  });
});
