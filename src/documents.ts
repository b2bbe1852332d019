import { createHash } from "node:crypto";
import type { CollectionName, DoctrineName } from "./types.js";
import { COLLECTIONS, DOCTRINES, YEAR_MAX, YEAR_MIN } from "./types.js";

export function sha256Hex(input: string | Buffer): string {
  return createHash("sha256").update(input).digest("hex");
}

export function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

/**
 * Stable document id: a slug of the title (when there is one) plus a hash of
 * the source path and a fingerprint of the content.
 */
export function buildDocumentId(sourcePath: string, contentFingerprint: string, title?: string | null): string {
  const digest = sha256Hex(`${sourcePath}\u0000${contentFingerprint}`).slice(0, 12);
  const slug = title ? slugify(title).slice(0, 60) : "";
  return slug ? `${slug}-${digest}` : `doc-${digest}`;
}

export function chunkIdFor(documentId: string, chunkIndex: number): string {
  return `${documentId}:${chunkIndex}`;
}

/** Merge tag lists: trimmed, first occurrence wins, empty tags dropped. */
export function mergeTags(...tagSets: Array<Iterable<string> | null | undefined>): string[] {
  const seen = new Set<string>();
  const merged: string[] = [];
  for (const set of tagSets) {
    if (!set) continue;
    for (const tag of set) {
      const norm = tag.trim();
      if (!norm || seen.has(norm)) continue;
      seen.add(norm);
      merged.push(norm);
    }
  }
  return merged;
}

export function parseYear(value: unknown): number | null {
  const n = typeof value === "string" && /^\d{4}$/.test(value.trim()) ? Number(value.trim()) : value;
  if (typeof n !== "number" || !Number.isInteger(n)) return null;
  return n >= YEAR_MIN && n <= YEAR_MAX ? n : null;
}

export function isCollection(value: unknown): value is CollectionName {
  return typeof value === "string" && COLLECTIONS.some((entry) => entry === value);
}

export function isDoctrine(value: unknown): value is DoctrineName {
  return typeof value === "string" && DOCTRINES.some((entry) => entry === value);
}

export const COLLECTION_DESCRIPTIONS: Record<CollectionName, string> = {
  doctrine: "Doctrine publications, field manuals and concepts",
  aar: "After-action reports and lessons learned",
  scenario: "Exercise and wargame scenario packages",
  intel: "Intelligence estimates and threat assessments",
  other: "Uncategorised reference material",
};
