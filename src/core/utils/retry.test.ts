import assert from "node:assert/strict";
import test from "node:test";
import { exponentialBackoffMs, RetryError, withRetry } from "./retry";

const noSleep = async (): Promise<void> => {};

test("withRetry stops at maxAttempts and wraps the last error", async () => {
  let calls = 0;
  await assert.rejects(
    withRetry(
      async () => {
        calls++;
        throw new Error("HTTP 503");
      },
      { maxAttempts: 5, delayMs: () => 0, sleep: noSleep },
    ),
    (error: unknown) => error instanceof RetryError && error.attempt === 5,
  );
  assert.equal(calls, 5);
});

test("withRetry rethrows immediately when the condition rejects the error", async () => {
  let calls = 0;
  await assert.rejects(
    withRetry(
      async () => {
        calls++;
        throw new Error("HTTP 404");
      },
      {
        maxAttempts: 5,
        delayMs: () => 0,
        sleep: noSleep,
        retryCondition: (e) => !e.message.includes("404"),
      },
    ),
    { message: "HTTP 404" },
  );
  assert.equal(calls, 1);
});

test("withRetry passes the attempt number and resolves on success", async () => {
  const seen: number[] = [];
  const delays: number[] = [];
  const result = await withRetry(
    async (attempt) => {
      seen.push(attempt);
      if (attempt < 3) throw new Error("flaky");
      return "ok";
    },
    {
      maxAttempts: 5,
      delayMs: (attempt) => attempt * 10,
      sleep: async (ms) => {
        delays.push(ms);
      },
    },
  );
  assert.equal(result, "ok");
  assert.deepEqual(seen, [1, 2, 3]);
  assert.deepEqual(delays, [10, 20]);
});

test("exponentialBackoffMs is base^attempt seconds plus bounded jitter", () => {
  const low = exponentialBackoffMs(3, { base: 2, jitterMinMs: 1000, jitterMaxMs: 3000, random: () => 0 });
  const high = exponentialBackoffMs(3, {
    base: 2,
    jitterMinMs: 1000,
    jitterMaxMs: 3000,
    random: () => 0.999999,
  });
  assert.equal(low, 9000);
  assert.equal(high, 11000);
});
