import test from "node:test";
import assert from "node:assert/strict";
import { FakeEmbeddingProvider } from "../src/embeddings.ts";
import { ValidationError } from "../src/errors.ts";
import { decayImportance, MemoryConsolidator } from "../src/memory/consolidation.ts";
import type { ConsolidationSettings } from "../src/memory/consolidation.ts";
import { MemoryGateway } from "../src/memory/gateway.ts";
import { createFakeMemoryBackend, record } from "./memory-fixtures.ts";

const DAY = 24 * 60 * 60 * 1000;
const NOW = Date.parse("2026-03-01T00:00:00.000Z");
const DUPLICATE = "Enemy armor massing near the river crossing.";

const SETTINGS: ConsolidationSettings = {
  ttlDays: 30,
  halfLifeDays: 10,
  mergeThreshold: 0.999,
  minImportance: 0.1,
  scanLimit: 100,
  similarityMetric: "cosine",
};

function iso(ms: number): string {
  return new Date(ms).toISOString();
}

function seededBackend() {
  const backend = createFakeMemoryBackend();
  backend.records.push(
    record({ memoryId: "m1", memory: "Old note about exercise planning.", createdAt: iso(NOW - 59 * DAY) }),
    record({ memoryId: "m2", memory: "Logistics convoy timing matters.", createdAt: iso(NOW - 10 * DAY), importance: 0.5 }),
    record({ memoryId: "m3", memory: "Weak hunch about weather.", createdAt: iso(NOW - 20 * DAY), importance: 0.3 }),
    record({ memoryId: "m4", memory: DUPLICATE, createdAt: iso(NOW), importance: 0.4, tags: ["a"] }),
    record({ memoryId: "m5", memory: DUPLICATE, createdAt: iso(NOW), importance: 0.7, tags: ["b"] }),
    record({ memoryId: "m6", userId: "u2", memory: DUPLICATE, createdAt: iso(NOW) }),
  );
  return backend;
}

test("decayImportance halves per half-life", () => {
  assert.equal(decayImportance(0.8, 0, 30), 0.8);
  assert.equal(decayImportance(0.8, 30 * DAY, 30), 0.4);
  assert.equal(decayImportance(0.8, 60 * DAY, 30), 0.2);
  assert.equal(decayImportance(0.8, -DAY, 30), 0.8);
});

test("a pass evicts expired and faded records, decays and merges the rest", async () => {
  const backend = seededBackend();
  const consolidator = new MemoryConsolidator(backend, new FakeEmbeddingProvider(64), SETTINGS, () => NOW);

  const report = await consolidator.run(["u1"]);
  assert.deepEqual(report, { scanned: 5, decayed: 1, evicted: 2, merged: 1 });

  const byId = new Map(backend.records.map((r) => [r.memoryId, r]));
  assert.deepEqual([...byId.keys()].sort(), ["m2", "m4", "m6"]);
  assert.equal(byId.get("m2")?.importance, 0.25);
  assert.equal(byId.get("m2")?.decayedAt, iso(NOW));
  assert.deepEqual(byId.get("m4")?.tags, ["a", "b"]);
  assert.equal(byId.get("m4")?.importance, 0.7);
  assert.deepEqual(
    backend.calls.filter((c) => c.startsWith("update:")).sort(),
    ["update:m2", "update:m4"],
  );
});

test("repeated passes compound decay from the stored anchor", async () => {
  const backend = seededBackend();
  let now = NOW;
  const consolidator = new MemoryConsolidator(backend, new FakeEmbeddingProvider(64), SETTINGS, () => now);
  await consolidator.run(["u1"]);

  now = NOW + 10 * DAY;
  const report = await new MemoryConsolidator(backend, new FakeEmbeddingProvider(64), SETTINGS, () => now).run(["u1"]);
  assert.deepEqual(report, { scanned: 2, decayed: 2, evicted: 0, merged: 0 });
  const byId = new Map(backend.records.map((r) => [r.memoryId, r]));
  assert.equal(byId.get("m2")?.importance, 0.125);
  assert.equal(byId.get("m4")?.importance, 0.35);
});

test("separate consolidators a second apart do not decay twice", async () => {
  const backend = createFakeMemoryBackend();
  backend.records.push(record({ memoryId: "d1", importance: 0.8, createdAt: iso(NOW - 10 * DAY) }));

  await new MemoryConsolidator(backend, new FakeEmbeddingProvider(64), SETTINGS, () => NOW).run(["u1"]);
  assert.equal(backend.records[0]?.importance, 0.4);

  await new MemoryConsolidator(backend, new FakeEmbeddingProvider(64), SETTINGS, () => NOW + 1000).run(["u1"]);
  const importance = backend.records[0]?.importance ?? 0;
  assert.ok(Math.abs(importance - 0.4) < 1e-3, `importance ${importance}`);
  assert.equal(backend.records[0]?.decayedAt, iso(NOW + 1000));
});

test("without update, decay is recomputed from the record age each pass", async () => {
  const backend = createFakeMemoryBackend();
  delete backend.update;
  backend.records.push(record({ memoryId: "n1", importance: 0.8, createdAt: iso(NOW - 10 * DAY) }));
  const settings = { ...SETTINGS, ttlDays: 365 };
  const at = (now: number) => new MemoryConsolidator(backend, new FakeEmbeddingProvider(64), settings, () => now);

  assert.deepEqual(await at(NOW).run(["u1"]), { scanned: 1, decayed: 1, evicted: 0, merged: 0 });
  assert.equal(backend.records[0]?.importance, 0.8);

  // 0.8 * 0.5^3 is exactly minImportance; a day later it falls below.
  assert.equal((await at(NOW + 20 * DAY).run(["u1"])).evicted, 0);
  assert.equal((await at(NOW + 20 * DAY + DAY).run(["u1"])).evicted, 1);
  assert.equal(backend.records.length, 0);
});

test("duplicates in different scopes are not merged", async () => {
  const backend = createFakeMemoryBackend();
  backend.records.push(
    record({ memoryId: "s1", memory: DUPLICATE, scope: "scenario", createdAt: iso(NOW) }),
    record({ memoryId: "s2", memory: DUPLICATE, scope: "user", createdAt: iso(NOW) }),
  );
  const report = await new MemoryConsolidator(backend, new FakeEmbeddingProvider(64), SETTINGS, () => NOW).run(["u1"]);
  assert.equal(report.merged, 0);
  assert.equal(backend.records.length, 2);
});

test("gateway consolidation covers every backend user and shares an in-flight pass", async () => {
  const backend = createFakeMemoryBackend({ withUsers: true });
  backend.records.push(
    record({ memoryId: "a1", userId: "u1", createdAt: iso(NOW) }),
    record({ memoryId: "b1", userId: "u2", createdAt: iso(NOW) }),
  );
  const consolidator = new MemoryConsolidator(backend, new FakeEmbeddingProvider(64), SETTINGS, () => NOW);
  const gateway = new MemoryGateway(
    backend,
    { dedupThreshold: 0.9, maxChars: 100, dailyQuota: 10, defaultLimit: 5, defaultScope: "user" },
    consolidator,
    () => NOW,
  );

  const [first, second] = await Promise.all([gateway.consolidate(), gateway.consolidate()]);
  assert.equal(first, second);
  assert.equal(first.scanned, 2);
  assert.deepEqual(
    backend.calls.filter((c) => c.startsWith("list:")),
    ["list:u1", "list:u2"],
  );
});

test("without a user listing the gateway consolidates users it has seen", async () => {
  const backend = createFakeMemoryBackend({ clock: () => NOW });
  const consolidator = new MemoryConsolidator(backend, new FakeEmbeddingProvider(64), SETTINGS, () => NOW);
  const gateway = new MemoryGateway(
    backend,
    { dedupThreshold: 0.9, maxChars: 100, dailyQuota: 10, defaultLimit: 5, defaultScope: "user" },
    consolidator,
    () => NOW,
  );
  await gateway.add({ userId: "u3", memory: "Keep reserves behind the ridge." });
  const report = await gateway.consolidate();
  assert.equal(report.scanned, 1);
  assert.ok(backend.calls.includes("list:u3"));
});

test("without a user listing or seen users the gateway refuses to consolidate", async () => {
  const backend = createFakeMemoryBackend({ clock: () => NOW });
  backend.records.push(record({ memoryId: "z1", createdAt: iso(NOW) }));
  const consolidator = new MemoryConsolidator(backend, new FakeEmbeddingProvider(64), SETTINGS, () => NOW);
  const gateway = new MemoryGateway(
    backend,
    { dedupThreshold: 0.9, maxChars: 100, dailyQuota: 10, defaultLimit: 5, defaultScope: "user" },
    consolidator,
    () => NOW,
  );

  await assert.rejects(gateway.consolidate(), ValidationError);
  assert.deepEqual(backend.calls, []);
  assert.equal((await gateway.consolidate(["u1"])).scanned, 1);
});
