import test from "node:test";
import assert from "node:assert/strict";
import { MemoryBackendError } from "../src/errors.ts";
import { HttpMemoryBackend } from "../src/memory/client.ts";

interface SeenRequest {
  url: string;
  method: string;
  headers: Headers;
  body: unknown;
}

function stubFetch(respond: (req: SeenRequest) => Response | Promise<Response>): { fetchImpl: typeof fetch; seen: SeenRequest[] } {
  const seen: SeenRequest[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const req: SeenRequest = {
      url: String(input),
      method: init?.method ?? "GET",
      headers: new Headers(init?.headers),
      body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined,
    };
    seen.push(req);
    return respond(req);
  };
  return { fetchImpl, seen };
}

function json(value: unknown, status = 200): Response {
  return new Response(JSON.stringify(value), { status, headers: { "content-type": "application/json" } });
}

test("search posts the query with auth and correlation headers", async () => {
  const { fetchImpl, seen } = stubFetch(() =>
    json({
      results: [
        { id: "m1", memory: "Prefer night ops", user_id: "u1", scope: "scenario", score: 0.8, tags: ["ops"] },
        { memory_id: "m2", memory: "Short briefs", score: 0.4 },
      ],
    }),
  );
  const backend = new HttpMemoryBackend({ baseUrl: "http://memory.local/", apiKey: "test-secret", fetchImpl });

  const results = await backend.search(
    { query: "night", userId: "u1", limit: 3, scopes: ["user", "scenario"] },
    { correlationId: "corr-1" },
  );

  assert.equal(seen[0]?.url, "http://memory.local/memories/search");
  assert.equal(seen[0]?.method, "POST");
  assert.deepEqual(seen[0]?.body, { query: "night", user_id: "u1", limit: 3, scopes: ["user", "scenario"] });
  assert.equal(seen[0]?.headers.get("authorization"), "Bearer test-secret");
  assert.equal(seen[0]?.headers.get("x-correlation-id"), "corr-1");
  assert.deepEqual(results, [
    {
      memoryId: "m1",
      userId: "u1",
      scope: "scenario",
      memory: "Prefer night ops",
      tags: ["ops"],
      source: null,
      importance: 0.5,
      createdAt: "1970-01-01T00:00:00.000Z",
      score: 0.8,
    },
    {
      memoryId: "m2",
      userId: "u1",
      scope: "user",
      memory: "Short briefs",
      tags: [],
      source: null,
      importance: 0.5,
      createdAt: "1970-01-01T00:00:00.000Z",
      score: 0.4,
    },
  ]);
});

test("add sends the memory and returns the new id", async () => {
  const { fetchImpl, seen } = stubFetch(() => json({ id: "m9", status: "created" }));
  const backend = new HttpMemoryBackend({ baseUrl: "http://memory.local", fetchImpl });
  const out = await backend.add({
    userId: "u1",
    scope: "user",
    memory: "Analyst wants COA tables",
    tags: ["preference"],
    source: "cli",
    importance: 0.6,
  });
  assert.deepEqual(out, { memoryId: "m9" });
  assert.equal(seen[0]?.url, "http://memory.local/memories");
  assert.equal(seen[0]?.headers.get("authorization"), null);
  assert.deepEqual(seen[0]?.body, {
    user_id: "u1",
    memory: "Analyst wants COA tables",
    scope: "user",
    tags: ["preference"],
    importance: 0.6,
    source: "cli",
  });
});

test("add without an id in the response fails", async () => {
  const { fetchImpl } = stubFetch(() => json({ status: "created" }));
  const backend = new HttpMemoryBackend({ baseUrl: "http://memory.local", fetchImpl });
  await assert.rejects(
    backend.add({ userId: "u1", scope: "user", memory: "x", tags: [], source: null, importance: 0.5 }),
    MemoryBackendError,
  );
});

test("delete maps 404 to not_found and surfaces other failures", async () => {
  const statuses = [200, 404, 500];
  const { fetchImpl, seen } = stubFetch(() => new Response("", { status: statuses.shift() ?? 500 }));
  const backend = new HttpMemoryBackend({ baseUrl: "http://memory.local", fetchImpl });

  assert.equal(await backend.delete("a/b"), "deleted");
  assert.equal(seen[0]?.url, "http://memory.local/memories/a%2Fb");
  assert.equal(seen[0]?.method, "DELETE");
  assert.equal(await backend.delete("gone"), "not_found");
  await assert.rejects(backend.delete("boom"), (err: unknown) => err instanceof MemoryBackendError && err.status === 500);
});

test("delete honours a not_found status in a 200 body", async () => {
  const bodies = [{ status: "not_found" }, { status: "deleted" }];
  const { fetchImpl } = stubFetch(() => json(bodies.shift() ?? {}));
  const backend = new HttpMemoryBackend({ baseUrl: "http://memory.local", fetchImpl });
  assert.equal(await backend.delete("m1"), "not_found");
  assert.equal(await backend.delete("m2"), "deleted");
});

test("list encodes filters into the query string and accepts bare arrays", async () => {
  const { fetchImpl, seen } = stubFetch(() => json([{ id: "m1", memory: "x", user_id: "u1" }]));
  const backend = new HttpMemoryBackend({ baseUrl: "http://memory.local", fetchImpl });
  const records = await backend.list({ userId: "u1", limit: 5, scope: "scenario", tags: ["a", "b"] });
  assert.equal(seen[0]?.url, "http://memory.local/memories?user_id=u1&limit=5&scope=scenario&tags=a%2Cb");
  assert.equal(seen[0]?.method, "GET");
  assert.deepEqual(
    records.map((r) => r.memoryId),
    ["m1"],
  );
});

test("update puts the mutable fields", async () => {
  const { fetchImpl, seen } = stubFetch(() => new Response(null, { status: 204 }));
  const backend = new HttpMemoryBackend({ baseUrl: "http://memory.local", fetchImpl });
  await backend.update({
    memoryId: "m1",
    userId: "u1",
    scope: "user",
    memory: "merged text",
    tags: ["a", "b"],
    source: null,
    importance: 0.7,
    createdAt: "2026-01-01T00:00:00.000Z",
  });
  assert.equal(seen[0]?.method, "PUT");
  assert.equal(seen[0]?.url, "http://memory.local/memories/m1");
  assert.deepEqual(seen[0]?.body, { memory: "merged text", tags: ["a", "b"], importance: 0.7 });
});

test("the decay anchor round-trips as decayed_at", async () => {
  const { fetchImpl, seen } = stubFetch((req) =>
    req.method === "GET"
      ? json({ results: [{ id: "m1", memory: "x", importance: 0.4, decayed_at: "2026-02-01T00:00:00.000Z" }] })
      : new Response(null, { status: 204 }),
  );
  const backend = new HttpMemoryBackend({ baseUrl: "http://memory.local", fetchImpl });
  const [listed] = await backend.list({ userId: "u1", limit: 1 });
  assert.ok(listed);
  assert.equal(listed.decayedAt, "2026-02-01T00:00:00.000Z");

  await backend.update({ ...listed, importance: 0.2, decayedAt: "2026-02-11T00:00:00.000Z" });
  assert.deepEqual(seen[1]?.body, { memory: "x", tags: [], importance: 0.2, decayed_at: "2026-02-11T00:00:00.000Z" });
});

test("malformed payloads and timeouts raise MemoryBackendError", async () => {
  const garbage = stubFetch(() => new Response("<html>", { status: 200 }));
  await assert.rejects(
    new HttpMemoryBackend({ baseUrl: "http://memory.local", fetchImpl: garbage.fetchImpl }).list({ userId: "u1", limit: 1 }),
    /did not contain valid JSON/,
  );

  const hanging: typeof fetch = (_input, init) =>
    new Promise((_resolve, reject) => {
      // AbortSignal.timeout does not keep the event loop alive on its own.
      const keepAlive = setTimeout(() => undefined, 5_000);
      const signal = init?.signal;
      if (signal)
        signal.addEventListener("abort", () => {
          clearTimeout(keepAlive);
          reject(signal.reason);
        });
    });
  await assert.rejects(
    new HttpMemoryBackend({ baseUrl: "http://memory.local", timeoutMs: 10, fetchImpl: hanging }).list({ userId: "u1", limit: 1 }),
    (err: unknown) => err instanceof MemoryBackendError && err.timedOut && err.message === "memory request timed out after 10ms",
  );
});

test("an empty base url is rejected", () => {
  assert.throws(() => new HttpMemoryBackend({ baseUrl: "  " }), MemoryBackendError);
});
