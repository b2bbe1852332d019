import test from "node:test";
import assert from "node:assert/strict";
import { ValidationError } from "../src/errors.ts";
import { defaultSleep, RetryPolicy } from "../src/resilience/retry.ts";

test("schedule doubles from the base delay up to the cap", () => {
  const policy = new RetryPolicy({ maxRetries: 5, baseDelayMs: 1000, maxDelayMs: 8000 });
  assert.deepEqual(policy.schedule(), [1000, 2000, 4000, 8000, 8000]);
});

test("full jitter scales the capped delay by the random draw", () => {
  const policy = new RetryPolicy({ maxRetries: 3, baseDelayMs: 1000, maxDelayMs: 8000, jitter: "full" }, () => 0.5);
  assert.deepEqual(policy.schedule(), [500, 1000, 2000]);
});

test("execute retries until success and sleeps between attempts", async () => {
  const policy = new RetryPolicy({ maxRetries: 3, baseDelayMs: 100, maxDelayMs: 1000 });
  const slept: number[] = [];
  const retried: number[] = [];
  const result = await policy.execute(
    async (attempt) => {
      if (attempt < 3) throw new Error(`fail ${attempt}`);
      return "ok";
    },
    {
      sleep: async (ms) => {
        slept.push(ms);
      },
      onRetry: (_err, attempt) => retried.push(attempt),
    },
  );
  assert.equal(result, "ok");
  assert.deepEqual(slept, [100, 200]);
  assert.deepEqual(retried, [1, 2]);
});

test("execute rethrows the last error once retries run out", async () => {
  const policy = new RetryPolicy({ maxRetries: 2, baseDelayMs: 10, maxDelayMs: 10 });
  let calls = 0;
  await assert.rejects(
    policy.execute(
      async (attempt) => {
        calls += 1;
        throw new Error(`fail ${attempt}`);
      },
      { sleep: async () => undefined },
    ),
    /fail 3/,
  );
  assert.equal(calls, 3);
});

test("execute stops when shouldRetry declines", async () => {
  const policy = new RetryPolicy({ maxRetries: 5, baseDelayMs: 10, maxDelayMs: 10 });
  let calls = 0;
  await assert.rejects(
    policy.execute(
      async () => {
        calls += 1;
        throw new ValidationError("bad input");
      },
      { sleep: async () => undefined, shouldRetry: (err) => !(err instanceof ValidationError) },
    ),
    ValidationError,
  );
  assert.equal(calls, 1);
});

test("execute does not retry after the signal aborts", async () => {
  const policy = new RetryPolicy({ maxRetries: 5, baseDelayMs: 10, maxDelayMs: 10 });
  const controller = new AbortController();
  let calls = 0;
  await assert.rejects(
    policy.execute(
      async () => {
        calls += 1;
        controller.abort(new Error("cancelled"));
        throw new Error("interrupted");
      },
      { signal: controller.signal, sleep: async () => undefined },
    ),
    /interrupted/,
  );
  assert.equal(calls, 1);
});

test("defaultSleep rejects with the abort reason", async () => {
  const controller = new AbortController();
  const pending = defaultSleep(60_000, controller.signal);
  controller.abort(new Error("stop"));
  await assert.rejects(pending, /stop/);

  await assert.rejects(defaultSleep(10, controller.signal), /stop/);
  await defaultSleep(1);
});
