/**
 * Token-window document segmentation.
 *
 * Windows of at most `maxTokens` tokens advance by `maxTokens - overlapTokens`.
 * Cuts land on structural boundaries (paragraphs, list items, table rows,
 * fenced code blocks) when one falls inside the window, then on sentence ends,
 * and only as a last resort at the hard token limit. Consecutive chunks share
 * `overlapTokens` tokens; every cut and overlap start sits on a character
 * boundary, so the overlap grows where a character spans several tokens.
 */

import { ValidationError } from "./errors.js";
import type { Tokenizer } from "./tokenizer.js";

export interface ChunkingConfig {
  /** Upper bound on tokens per chunk (default 800) */
  maxTokens: number;
  /** Tokens shared by consecutive chunks (default 200) */
  overlapTokens: number;
}

export const DEFAULT_CHUNKING_CONFIG: ChunkingConfig = {
  maxTokens: 800,
  overlapTokens: 200,
};

export interface Segment {
  /** Chunk text */
  text: string;
  /** 0-based index */
  index: number;
  tokenCount: number;
}

export interface SegmentResult {
  chunks: Segment[];
  /** Tokens in the whole (normalized) document */
  tokenCount: number;
}

type BoundaryKind = "structural" | "sentence";

interface Piece {
  text: string;
  /** Kind of boundary at the start of this piece */
  kind: BoundaryKind;
}

const LIST_ITEM = /^\s*(?:[-*+•]|\d+[.)])\s+/;
const TABLE_ROW = /^\s*\|/;
const FENCE = /^\s*(```|~~~)/;
const SENTENCE = /[^.!?]*[.!?]+(?:\s+|$)/g;

export function normalizeText(text: string): string {
  return text.replace(/\r\n?/g, "\n").trim();
}

/**
 * Split text into structural units. Each unit keeps its trailing newlines so
 * that concatenating all units reproduces the text exactly.
 */
function splitUnits(text: string): string[] {
  const lines = text.split("\n");
  const units: string[] = [];
  let current = "";
  let inFence = false;
  let previousBlank = false;

  const flush = () => {
    if (current.length > 0) units.push(current);
    current = "";
  };

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? "";
    const isLast = i === lines.length - 1;
    const withNewline = isLast ? line : `${line}\n`;
    const blank = line.trim().length === 0;

    if (inFence) {
      current += withNewline;
      if (FENCE.test(line)) {
        inFence = false;
        // Code block ends here; whatever follows is a new unit.
        flush();
      }
      previousBlank = false;
      continue;
    }

    const startsUnit =
      !blank &&
      current.length > 0 &&
      (previousBlank || LIST_ITEM.test(line) || TABLE_ROW.test(line) || FENCE.test(line));
    if (startsUnit) flush();

    if (FENCE.test(line)) inFence = true;
    current += withNewline;
    previousBlank = blank;
  }
  flush();
  return units;
}

/** Split a prose unit on sentence ends; fenced code and table rows stay whole. */
function splitSentences(unit: string): string[] {
  if (FENCE.test(unit) || TABLE_ROW.test(unit)) return [unit];
  const parts: string[] = [];
  let consumed = 0;
  SENTENCE.lastIndex = 0;
  while (SENTENCE.exec(unit) !== null) {
    // Slice from the last cut so text skipped by the matcher (e.g. "1.5") is kept.
    parts.push(unit.slice(consumed, SENTENCE.lastIndex));
    consumed = SENTENCE.lastIndex;
  }
  if (consumed < unit.length) parts.push(unit.slice(consumed));
  return parts.filter((p) => p.length > 0);
}

function toPieces(text: string): Piece[] {
  const pieces: Piece[] = [];
  for (const unit of splitUnits(text)) {
    splitSentences(unit).forEach((sentence, i) => {
      pieces.push({ text: sentence, kind: i === 0 ? "structural" : "sentence" });
    });
  }
  return pieces;
}

/** Largest boundary b of `kind` with lo < b <= hi, or null. Boundaries are sorted. */
function lastBoundaryIn(boundaries: Array<{ at: number; kind: BoundaryKind }>, lo: number, hi: number, kind: BoundaryKind): number | null {
  for (let i = boundaries.length - 1; i >= 0; i--) {
    const b = boundaries[i];
    if (!b || b.at > hi) continue;
    if (b.at <= lo) return null;
    if (b.kind === kind) return b.at;
  }
  return null;
}

/**
 * Cut with no structural or sentence boundary in reach: the largest
 * character-safe offset in (start, hi], or past `hi` only when a single
 * character spans the whole window.
 */
function hardCut(safe: readonly boolean[], start: number, hi: number): number {
  for (let at = hi; at > start; at--) {
    if (safe[at]) return at;
  }
  for (let at = hi + 1; at < safe.length; at++) {
    if (safe[at]) return at;
  }
  return safe.length - 1;
}

/**
 * Next window start: `end - overlapTokens`, moved back to a character-safe
 * offset. Drops the overlap when no safe offset lies after `start`.
 */
function overlapStart(safe: readonly boolean[], start: number, end: number, overlapTokens: number): number {
  for (let at = end - overlapTokens; at > start; at--) {
    if (safe[at]) return at;
  }
  return end;
}

/**
 * Segment `text` into overlapping token windows.
 *
 * Deterministic for identical input and configuration. Empty or non-string
 * input yields zero chunks; text shorter than `maxTokens` yields one.
 */
export function segmentText(
  text: unknown,
  tokenizer: Tokenizer,
  config: ChunkingConfig = DEFAULT_CHUNKING_CONFIG,
): SegmentResult {
  const { maxTokens, overlapTokens } = config;
  if (!Number.isInteger(maxTokens) || maxTokens < 1) {
    throw new ValidationError(`maxTokens must be a positive integer (got ${maxTokens})`);
  }
  if (!Number.isInteger(overlapTokens) || overlapTokens < 0 || overlapTokens >= maxTokens) {
    throw new ValidationError(`overlapTokens must be in [0, maxTokens) (got ${overlapTokens})`);
  }
  if (typeof text !== "string") return { chunks: [], tokenCount: 0 };

  const normalized = normalizeText(text);
  if (normalized.length === 0) return { chunks: [], tokenCount: 0 };

  const tokens: number[] = [];
  const boundaries: Array<{ at: number; kind: BoundaryKind }> = [];
  for (const piece of toPieces(normalized)) {
    if (tokens.length > 0) boundaries.push({ at: tokens.length, kind: piece.kind });
    for (const t of tokenizer.encode(piece.text)) tokens.push(t);
  }

  const total = tokens.length;
  const safe = tokenizer.charBoundaries(tokens);
  const chunks: Segment[] = [];
  let start = 0;

  while (start < total) {
    let end: number;
    if (total - start <= maxTokens) {
      end = total;
    } else {
      // A cut must leave room for the overlap, or the next window would not advance.
      const lo = start + overlapTokens;
      const hi = start + maxTokens;
      end =
        lastBoundaryIn(boundaries, lo, hi, "structural") ??
        lastBoundaryIn(boundaries, lo, hi, "sentence") ??
        hardCut(safe, start, hi);
    }

    const slice = tokens.slice(start, end);
    chunks.push({ text: tokenizer.decode(slice), index: chunks.length, tokenCount: slice.length });

    if (end >= total) break;
    start = overlapStart(safe, start, end, overlapTokens);
  }

  return { chunks, tokenCount: total };
}

/** Convenience form returning chunk texts only. */
export function segment(text: unknown, maxTokens: number, overlapTokens: number, tokenizer: Tokenizer): string[] {
  return segmentText(text, tokenizer, { maxTokens, overlapTokens }).chunks.map((c) => c.text);
}
