import test from "node:test";
import assert from "node:assert/strict";
import { ValidationError } from "../src/errors.ts";
import { MemoryGateway } from "../src/memory/gateway.ts";
import type { MemoryGatewaySettings } from "../src/memory/gateway.ts";
import type { MemoryScope } from "../src/types.ts";
import { createFakeMemoryBackend, record } from "./memory-fixtures.ts";

const SETTINGS: MemoryGatewaySettings = {
  dedupThreshold: 0.9,
  maxChars: 100,
  dailyQuota: 2,
  defaultLimit: 5,
  defaultScope: "user",
};

test("add creates a scored memory and deduplicates a repeat", async () => {
  const backend = createFakeMemoryBackend();
  const gateway = new MemoryGateway(backend, SETTINGS);

  const first = await gateway.add({ userId: "u1", memory: "  Prefer night insertion for recon teams.  ", tags: ["preference"] });
  assert.deepEqual(first, { memoryId: "mem-1", status: "created" });
  assert.equal(backend.records[0]?.memory, "Prefer night insertion for recon teams.");
  assert.equal(backend.records[0]?.importance, 0.58);
  assert.equal(backend.records[0]?.scope, "user");
  assert.equal(gateway.remainingQuota("u1"), 1);

  const again = await gateway.add({ userId: "u1", memory: "Prefer night insertion for recon teams." });
  assert.deepEqual(again, { memoryId: "mem-1", status: "deduplicated" });
  assert.equal(backend.records.length, 1);
  assert.equal(gateway.remainingQuota("u1"), 1);
});

test("dedup only looks inside the requested scope", async () => {
  const backend = createFakeMemoryBackend();
  const gateway = new MemoryGateway(backend, SETTINGS);
  await gateway.add({ userId: "u1", memory: "Bridge at grid 4512 is down.", scope: "scenario" });
  const other = await gateway.add({ userId: "u1", memory: "Bridge at grid 4512 is down.", scope: "user" });
  assert.deepEqual(other, { memoryId: "mem-2", status: "created" });
});

test("the daily quota rejects further adds until the UTC day rolls over", async () => {
  let now = Date.parse("2026-03-01T10:00:00.000Z");
  const backend = createFakeMemoryBackend({ clock: () => now });
  const gateway = new MemoryGateway(backend, SETTINGS, null, () => now);

  assert.equal((await gateway.add({ userId: "u1", memory: "alpha one" })).status, "created");
  assert.equal((await gateway.add({ userId: "u1", memory: "bravo two" })).status, "created");
  const callsBefore = backend.calls.length;
  assert.deepEqual(await gateway.add({ userId: "u1", memory: "charlie three" }), {
    memoryId: null,
    status: "rejected_quota",
    reason: "daily_quota",
  });
  assert.equal(backend.calls.length, callsBefore);
  assert.equal(gateway.remainingQuota("u1"), 0);
  assert.equal(gateway.remainingQuota("u2"), 2);

  now += 24 * 60 * 60 * 1000;
  assert.equal(gateway.remainingQuota("u1"), 2);
  assert.equal((await gateway.add({ userId: "u1", memory: "charlie three" })).status, "created");
});

test("concurrent adds cannot overrun the quota", async () => {
  const gateway = new MemoryGateway(createFakeMemoryBackend(), SETTINGS);
  const results = await Promise.all([
    gateway.add({ userId: "u1", memory: "first distinct note" }),
    gateway.add({ userId: "u1", memory: "second unrelated entry" }),
    gateway.add({ userId: "u1", memory: "third separate record" }),
  ]);
  assert.deepEqual(
    results.map((r) => r.status),
    ["created", "created", "rejected_quota"],
  );
});

test("over-long memories are rejected without touching the backend", async () => {
  const backend = createFakeMemoryBackend();
  const gateway = new MemoryGateway(backend, SETTINGS);
  assert.deepEqual(await gateway.add({ userId: "u1", memory: "x".repeat(101) }), {
    memoryId: null,
    status: "rejected_quota",
    reason: "too_long",
  });
  assert.deepEqual(backend.calls, []);
  assert.equal(gateway.remainingQuota("u1"), 2);
});

test("a failed backend write hands the quota slot back", async () => {
  const gateway = new MemoryGateway(createFakeMemoryBackend({ failAdd: true }), SETTINGS);
  await assert.rejects(gateway.add({ userId: "u1", memory: "will not be stored" }), /backend unavailable/);
  assert.equal(gateway.remainingQuota("u1"), 2);
});

test("inputs are validated", async () => {
  const gateway = new MemoryGateway(createFakeMemoryBackend(), SETTINGS);
  await assert.rejects(gateway.add({ userId: " ", memory: "text" }), ValidationError);
  await assert.rejects(gateway.add({ userId: "u1", memory: "   " }), ValidationError);
  await assert.rejects(gateway.search("", "u1"), ValidationError);
  await assert.rejects(gateway.search("q", "u1", 0), ValidationError);
  await assert.rejects(gateway.list("", 5), ValidationError);
  await assert.rejects(gateway.delete(" "), ValidationError);
});

test("search keeps the caller's records, ranked, across all scopes by default", async () => {
  const backend = createFakeMemoryBackend();
  const requested: MemoryScope[][] = [];
  backend.search = async (params) => {
    requested.push(params.scopes);
    return [
      record({ memoryId: "b", score: 0.2 }),
      record({ memoryId: "x", userId: "u2", score: 0.9 }),
      record({ memoryId: "c", score: 0.8 }),
      record({ memoryId: "a", score: 0.8 }),
    ];
  };
  const gateway = new MemoryGateway(backend, SETTINGS);

  const hits = await gateway.search("anything", "u1", 2);
  assert.deepEqual(
    hits.map((h) => h.memoryId),
    ["a", "c"],
  );
  await gateway.search("anything", "u1", 2, ["scenario"]);
  assert.deepEqual(requested, [["user", "scenario", "agent"], ["scenario"]]);
});

test("list filters by scope and delete reports missing ids", async () => {
  const gateway = new MemoryGateway(createFakeMemoryBackend(), SETTINGS);
  await gateway.add({ userId: "u1", memory: "Scenario red force uses drones.", scope: "scenario" });
  await gateway.add({ userId: "u1", memory: "Analyst wants short briefs." });

  const scenario = await gateway.list("u1", 5, "scenario");
  assert.deepEqual(
    scenario.map((r) => r.memoryId),
    ["mem-1"],
  );
  assert.equal((await gateway.list("u1")).length, 2);

  assert.equal(await gateway.delete("mem-1"), "deleted");
  assert.equal(await gateway.delete("mem-1"), "not_found");
});

test("consolidate without a consolidator is a no-op", async () => {
  const gateway = new MemoryGateway(createFakeMemoryBackend(), SETTINGS);
  assert.deepEqual(await gateway.consolidate(), { scanned: 0, decayed: 0, evicted: 0, merged: 0 });
});
