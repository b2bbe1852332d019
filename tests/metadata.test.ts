import test from "node:test";
import assert from "node:assert/strict";
import os from "node:os";
import path from "node:path";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { buildDocumentId, mergeTags, parseYear } from "../src/documents.ts";
import { filenameCandidate, MetadataResolver } from "../src/metadata.ts";

test("filenameCandidate derives title, year and collection from the file name", () => {
  assert.deepEqual(filenameCandidate("/docs/2019_aar_urban_ops.pdf"), {
    title: "2019 aar urban ops",
    year: 2019,
    collection: "aar",
  });
  assert.deepEqual(filenameCandidate("/docs/field-notes.txt"), {
    title: "field notes",
    year: undefined,
    collection: undefined,
  });
});

test("parseYear accepts four-digit years inside 1900-2100", () => {
  assert.equal(parseYear(1999), 1999);
  assert.equal(parseYear(" 2024 "), 2024);
  assert.equal(parseYear(2100), 2100);
  assert.equal(parseYear(1899), null);
  assert.equal(parseYear(2101), null);
  assert.equal(parseYear("abcd"), null);
  assert.equal(parseYear(2019.5), null);
});

test("mergeTags trims and keeps first occurrences", () => {
  assert.deepEqual(mergeTags(["a", " b "], null, ["b", "", "c", "a"]), ["a", "b", "c"]);
});

test("resolveFrom takes each field from the highest-priority source that has it", () => {
  const resolver = new MetadataResolver();
  const resolved = resolver.resolveFrom("/docs/2019_aar_notes.md", "fp", [
    ["sidecar", { title: "Sidecar Title", collection: "doctrine", tags: ["a"] }],
    ["embedded", { title: "Embedded Title", year: 2005, doctrine: "Land", tags: ["b", "a"] }],
    ["filename", filenameCandidate("/docs/2019_aar_notes.md")],
  ]);
  assert.deepEqual(resolved.warnings, []);
  assert.equal(resolved.ocr, false);
  assert.deepEqual(resolved.metadata, {
    documentId: buildDocumentId("/docs/2019_aar_notes.md", "fp", "Sidecar Title"),
    sourcePath: "/docs/2019_aar_notes.md",
    collection: "doctrine",
    title: "Sidecar Title",
    year: 2005,
    doctrine: "land",
    tags: ["a", "b"],
  });
});

test("invalid values are cleared with warnings instead of falling through", () => {
  const resolver = new MetadataResolver();
  const resolved = resolver.resolveFrom("/docs/2019_aar.md", "fp", [
    ["sidecar", { collection: "bogus", year: 1850, doctrine: "naval" }],
    ["filename", filenameCandidate("/docs/2019_aar.md")],
  ]);
  assert.equal(resolved.metadata.collection, "other");
  assert.equal(resolved.metadata.year, null);
  assert.equal(resolved.metadata.doctrine, null);
  assert.deepEqual(
    resolved.warnings.map((w) => [w.field, w.source]),
    [
      ["collection", "sidecar"],
      ["year", "sidecar"],
      ["doctrine", "sidecar"],
    ],
  );
});

test("document id defaults to a title slug plus a content hash", () => {
  const resolver = new MetadataResolver();
  const resolved = resolver.resolveFrom("/docs/field_notes.txt", "abc", [
    ["filename", filenameCandidate("/docs/field_notes.txt")],
  ]);
  assert.match(resolved.metadata.documentId, /^field-notes-[0-9a-f]{12}$/);
  assert.equal(resolved.metadata.documentId, buildDocumentId("/docs/field_notes.txt", "abc", "field notes"));
  assert.equal(resolved.metadata.collection, "other");

  const explicit = resolver.resolveFrom("/docs/field_notes.txt", "abc", [["sidecar", { documentId: "fm-3-0" }]]);
  assert.equal(explicit.metadata.documentId, "fm-3-0");
  assert.equal(explicit.metadata.title, "field_notes");
});

test("resolve reads a YAML sidecar next to the document", async () => {
  const dir = await mkdtemp(path.join(os.tmpdir(), "wargame-metadata-"));
  try {
    const doc = path.join(dir, "report.md");
    await writeFile(doc, "body", "utf-8");
    await writeFile(
      `${doc}.meta.yml`,
      "title: Urban Ops\ncollection: AAR\nyear: 2019\nocr: true\ntags:\n  - urban\n  - night\n",
      "utf-8",
    );
    const resolved = await new MetadataResolver().resolve(doc, { title: "Ignored", tags: ["embedded"] }, "fp");
    assert.equal(resolved.metadata.title, "Urban Ops");
    assert.equal(resolved.metadata.collection, "aar");
    assert.equal(resolved.metadata.year, 2019);
    assert.deepEqual(resolved.metadata.tags, ["urban", "night", "embedded"]);
    assert.equal(resolved.ocr, true);
    assert.deepEqual(resolved.warnings, []);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test("an unreadable sidecar is reported and lower sources still apply", async () => {
  const dir = await mkdtemp(path.join(os.tmpdir(), "wargame-metadata-"));
  try {
    const doc = path.join(dir, "2021_intel_brief.txt");
    await writeFile(doc, "body", "utf-8");
    await writeFile(`${doc}.meta.json`, "{not json", "utf-8");
    const resolved = await new MetadataResolver().resolve(doc, {}, "fp");
    assert.equal(resolved.warnings.length, 1);
    assert.equal(resolved.warnings[0]?.field, "sidecar");
    assert.equal(resolved.metadata.collection, "intel");
    assert.equal(resolved.metadata.year, 2021);
    assert.equal(resolved.metadata.title, "2021 intel brief");
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});
