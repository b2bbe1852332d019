import test from "node:test";
import assert from "node:assert/strict";
import { FakeEmbeddingProvider } from "../src/embeddings.ts";
import { ValidationError } from "../src/errors.ts";
import { KnowledgeRetriever } from "../src/retriever.ts";
import type { CollectionName } from "../src/types.ts";
import { SqliteVectorIndex } from "../src/vector-index.ts";
import type { IndexedChunk } from "../src/vector-index.ts";

const embeddings = new FakeEmbeddingProvider(32);

function doc(documentId: string, texts: string[], collection: CollectionName): IndexedChunk[] {
  return texts.map((text, i) => ({
    chunkId: `${documentId}:${i}`,
    documentId,
    chunkIndex: i,
    chunkCount: texts.length,
    text,
    ocr: false,
    vector: embeddings.vectorFor(text),
    metadata: {
      documentId,
      sourcePath: `/docs/${documentId}.txt`,
      collection,
      title: documentId,
      year: null,
      doctrine: null,
      tags: [],
    },
  }));
}

async function seeded(): Promise<{ index: SqliteVectorIndex; retriever: KnowledgeRetriever }> {
  const index = new SqliteVectorIndex(":memory:");
  await index.replaceDocument("fires", "/docs/fires.txt", doc("fires", ["Massing fires at the decisive point.", "Counter-battery drills."], "doctrine"));
  await index.replaceDocument("urban", "/docs/urban.txt", doc("urban", ["Urban clearance lessons.", "Night movement lessons."], "aar"));
  await index.replaceDocument("six", "/docs/six.txt", doc("six", ["s0", "s1", "s2", "s3", "s4", "s5"], "scenario"));
  return { index, retriever: new KnowledgeRetriever(index, embeddings) };
}

test("search ranks the matching chunk first and honours min_score", async () => {
  const { index, retriever } = await seeded();
  try {
    const hits = await retriever.search("Urban clearance lessons.", { topK: 3 });
    assert.equal(hits.length, 3);
    assert.equal(hits[0]?.chunkId, "urban:0");
    assert.ok(Math.abs((hits[0]?.score ?? 0) - 1) < 1e-9);
    for (let i = 1; i < hits.length; i++) assert.ok((hits[i - 1]?.score ?? 0) >= (hits[i]?.score ?? 0));

    const strict = await retriever.search("Urban clearance lessons.", { topK: 10, minScore: 0.99 });
    assert.deepEqual(
      strict.map((h) => h.chunkId),
      ["urban:0"],
    );
  } finally {
    index.close();
  }
});

test("search restricts results to the requested collections", async () => {
  const { index, retriever } = await seeded();
  try {
    const hits = await retriever.search("Urban clearance lessons.", { topK: 10, collections: ["doctrine"] });
    assert.deepEqual(hits.map((h) => h.chunkId).sort(), ["fires:0", "fires:1"]);
  } finally {
    index.close();
  }
});

test("search validates its arguments", async () => {
  const { index, retriever } = await seeded();
  try {
    await assert.rejects(retriever.search("   "), ValidationError);
    await assert.rejects(retriever.search("q", { topK: 0 }), ValidationError);
    await assert.rejects(retriever.search("q", { topK: 51 }), ValidationError);
    await assert.rejects(retriever.search("q", { topK: 1.5 }), ValidationError);
    await assert.rejects(retriever.search("q", { minScore: -0.1 }), ValidationError);
    await assert.rejects(retriever.search("q", { minScore: 1.1 }), ValidationError);
  } finally {
    index.close();
  }
});

test("getSpan returns the neighbourhood clipped to the document", async () => {
  const { index, retriever } = await seeded();
  try {
    assert.deepEqual(
      (await retriever.getSpan("six", 5, 2)).map((c) => c.chunkIndex),
      [3, 4, 5],
    );
    assert.deepEqual(
      (await retriever.getSpan("six", 0)).map((c) => c.chunkIndex),
      [0, 1, 2],
    );
    assert.deepEqual(
      (await retriever.getSpan("six", 2, 0)).map((c) => c.text),
      ["s2"],
    );
    assert.deepEqual(await retriever.getSpan("missing", 0, 2), []);
    await assert.rejects(retriever.getSpan("six", 1, -1), ValidationError);
    await assert.rejects(retriever.getSpan("six", -1, 1), ValidationError);
  } finally {
    index.close();
  }
});

test("healthCheck reports degraded, ok and error states", async () => {
  const empty = new SqliteVectorIndex(":memory:");
  assert.deepEqual(await new KnowledgeRetriever(empty, embeddings).healthCheck(), {
    status: "degraded",
    details: "0 chunks indexed across 0 documents in 0 collections",
  });
  empty.close();

  const { index, retriever } = await seeded();
  assert.deepEqual(await retriever.healthCheck(), {
    status: "ok",
    details: "10 chunks indexed across 3 documents in 3 collections",
  });
  index.close();

  const report = await retriever.healthCheck();
  assert.equal(report.status, "error");
  assert.match(report.details, /^index unreachable: /);
});
