import { describe, it, expect, beforeEach, vi } from "vitest";
import express from "express";
import supertest from "supertest";
import { rateLimiter, RateLimitCounter } from "../../src/presentation/http/rateLimiter";

function createCounter(): RateLimitCounter & { counts: Map<string, number> } {
  const counts = new Map<string, number>();
  return {
    counts,
    incr: vi.fn(async (key: string) => {
      const next = (counts.get(key) ?? 0) + 1;
      counts.set(key, next);
      return next;
    }),
    expire: vi.fn(async () => 1)
  };
}

function createTestApp(redis: RateLimitCounter, maxRequests: number) {
  const app = express();
  app.use(express.json());
  app.post(
    "/buy",
    rateLimiter({
      redis,
      windowMs: 10000,
      maxRequests,
      keyPrefix: "ratelimit:buy",
      extractId: (req) => {
        const body: unknown = req.body;
        if (body && typeof body === "object" && "buyer" in body && typeof body.buyer === "string") {
          return body.buyer;
        }
        return null;
      }
    }),
    (_req, res) => {
      res.json({ status: "ok" });
    }
  );
  return app;
}

describe("rateLimiter", () => {
  let counter: ReturnType<typeof createCounter>;

  beforeEach(() => {
    counter = createCounter();
  });

  it("allows requests up to the limit and reports the remaining budget", async () => {
    const app = createTestApp(counter, 2);

    const first = await supertest(app).post("/buy").send({ buyer: "account:alice" });

    expect(first.status).toBe(200);
    expect(first.headers["x-ratelimit-limit"]).toBe("2");
    expect(first.headers["x-ratelimit-remaining"]).toBe("1");
    expect(counter.expire).toHaveBeenCalledWith("ratelimit:buy:account:alice", 10);
  });

  it("rejects requests past the limit with 429", async () => {
    const app = createTestApp(counter, 1);

    await supertest(app).post("/buy").send({ buyer: "account:alice" });
    const second = await supertest(app).post("/buy").send({ buyer: "account:alice" });

    expect(second.status).toBe(429);
    expect(second.body).toEqual({
      error: "RATE_LIMITED",
      message: "Too many requests. Limit: 1 per 10s window."
    });
  });

  it("counts each buyer separately", async () => {
    const app = createTestApp(counter, 1);

    await supertest(app).post("/buy").send({ buyer: "account:alice" });
    const other = await supertest(app).post("/buy").send({ buyer: "account:bob" });

    expect(other.status).toBe(200);
  });

  it("skips counting when no id can be extracted", async () => {
    const app = createTestApp(counter, 1);

    await supertest(app).post("/buy").send({});
    const again = await supertest(app).post("/buy").send({});

    expect(again.status).toBe(200);
    expect(counter.incr).not.toHaveBeenCalled();
  });

  it("lets requests through when the counter store fails", async () => {
    const failing: RateLimitCounter = {
      incr: vi.fn(async () => {
        throw new Error("connection refused");
      }),
      expire: vi.fn(async () => 1)
    };
    const app = createTestApp(failing, 1);

    const response = await supertest(app).post("/buy").send({ buyer: "account:alice" });

    expect(response.status).toBe(200);
  });
});
