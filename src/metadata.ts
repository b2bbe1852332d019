import path from "node:path";
import { readFile } from "node:fs/promises";
import { buildDocumentId, isCollection, isDoctrine, mergeTags, parseYear } from "./documents.js";
import { parseSimpleYaml } from "./extractors.js";
import { log } from "./logger.js";
import { SidecarMetadataSchema } from "./schemas.js";
import type { CollectionName, DocumentMetadata, MetadataSource, MetadataWarning } from "./types.js";
import { COLLECTIONS } from "./types.js";

const SIDECAR_SUFFIXES = [".meta.yml", ".meta.yaml", ".meta.json"] as const;
const FILENAME_YEAR = /(?:^|[^0-9])((?:19|20)\d{2}|2100)(?![0-9])/;

/** Field values one source contributes; absent fields fall through to the next source. */
export interface MetadataCandidate {
  documentId?: unknown;
  title?: unknown;
  collection?: unknown;
  year?: unknown;
  doctrine?: unknown;
  tags?: unknown;
  ocr?: unknown;
}

export interface ResolvedMetadata {
  metadata: DocumentMetadata;
  ocr: boolean;
  warnings: MetadataWarning[];
}

function tagList(value: unknown): string[] {
  if (typeof value === "string") return value.split(",");
  if (Array.isArray(value)) return value.filter((v): v is string => typeof v === "string");
  return [];
}

function present(value: unknown): boolean {
  if (value === undefined || value === null) return false;
  return typeof value !== "string" || value.trim().length > 0;
}

/** Title, year and collection guessed from a file name like `2019_aar_urban_ops.pdf`. */
export function filenameCandidate(sourcePath: string): MetadataCandidate {
  const stem = path.basename(sourcePath, path.extname(sourcePath));
  const words = stem.toLowerCase().split(/[^a-z0-9]+/).filter(Boolean);
  const year = stem.match(FILENAME_YEAR)?.[1];
  const collection = COLLECTIONS.find((c) => c !== "other" && words.includes(c));
  return {
    title: stem.replace(/[_-]+/g, " ").trim(),
    year: year ? Number(year) : undefined,
    collection,
  };
}

/**
 * Resolves document metadata from sidecar file, embedded metadata, file name
 * and defaults, in that order. Never throws: bad values are dropped with a warning.
 */
export class MetadataResolver {
  async loadSidecar(sourcePath: string): Promise<{ candidate: MetadataCandidate | null; warnings: MetadataWarning[] }> {
    for (const suffix of SIDECAR_SUFFIXES) {
      const sidecarPath = `${sourcePath}${suffix}`;
      let raw: string;
      try {
        raw = await readFile(sidecarPath, "utf-8");
      } catch {
        continue;
      }
      let data: unknown;
      try {
        data = suffix === ".meta.json" ? JSON.parse(raw) : parseSimpleYaml(raw);
      } catch (err) {
        return { candidate: null, warnings: [sidecarWarning(sidecarPath, `unreadable sidecar: ${String(err)}`)] };
      }
      const parsed = SidecarMetadataSchema.safeParse(data);
      if (!parsed.success) {
        return {
          candidate: null,
          warnings: [sidecarWarning(sidecarPath, `invalid sidecar: ${parsed.error.issues[0]?.message ?? "unknown"}`)],
        };
      }
      const s = parsed.data;
      return {
        candidate: {
          documentId: s.document_id,
          title: s.title,
          collection: s.collection,
          year: s.year,
          doctrine: s.doctrine,
          tags: s.tags,
          ocr: s.ocr,
        },
        warnings: [],
      };
    }
    return { candidate: null, warnings: [] };
  }

  async resolve(sourcePath: string, embedded: Record<string, unknown>, contentFingerprint: string): Promise<ResolvedMetadata> {
    const sidecar = await this.loadSidecar(sourcePath);
    const resolved = this.resolveFrom(
      sourcePath,
      contentFingerprint,
      [
        ["sidecar", sidecar.candidate],
        ["embedded", embeddedCandidate(embedded)],
        ["filename", filenameCandidate(sourcePath)],
      ],
    );
    resolved.warnings.unshift(...sidecar.warnings);
    for (const w of resolved.warnings) {
      log.debug(`metadata warning path=${sourcePath} field=${w.field} source=${w.source}: ${w.message}`);
    }
    return resolved;
  }

  /** Pure resolution over already loaded candidates, highest priority first. */
  resolveFrom(
    sourcePath: string,
    contentFingerprint: string,
    sources: Array<[MetadataSource, MetadataCandidate | null]>,
  ): ResolvedMetadata {
    const warnings: MetadataWarning[] = [];
    const chain = sources.filter((entry): entry is [MetadataSource, MetadataCandidate] => entry[1] !== null);

    let title: string | null = null;
    let documentId: string | null = null;
    let collection: CollectionName | null = null;
    let year: number | null = null;
    let yearDecided = false;
    let doctrine: DocumentMetadata["doctrine"] = null;
    let doctrineDecided = false;
    let ocr = false;
    let ocrDecided = false;

    for (const [source, c] of chain) {
      if (title === null && typeof c.title === "string" && c.title.trim()) title = c.title.trim();
      if (documentId === null && typeof c.documentId === "string" && c.documentId.trim()) {
        documentId = c.documentId.trim();
      }

      if (collection === null && present(c.collection)) {
        const value = typeof c.collection === "string" ? c.collection.trim().toLowerCase() : c.collection;
        if (isCollection(value)) {
          collection = value;
        } else {
          warnings.push({ field: "collection", value: c.collection, source, message: `unknown collection; using "other"` });
          collection = "other";
        }
      }

      if (!yearDecided && present(c.year)) {
        yearDecided = true;
        year = parseYear(c.year);
        if (year === null) {
          warnings.push({ field: "year", value: c.year, source, message: "year outside 1900-2100; cleared" });
        }
      }

      if (!doctrineDecided && present(c.doctrine)) {
        doctrineDecided = true;
        const value = typeof c.doctrine === "string" ? c.doctrine.trim().toLowerCase() : c.doctrine;
        if (isDoctrine(value)) {
          doctrine = value;
        } else {
          warnings.push({ field: "doctrine", value: c.doctrine, source, message: "unknown doctrine; cleared" });
        }
      }

      if (!ocrDecided && typeof c.ocr === "boolean") {
        ocrDecided = true;
        ocr = c.ocr;
      }
    }

    const resolvedTitle = title ?? path.basename(sourcePath, path.extname(sourcePath));
    return {
      metadata: {
        documentId: documentId ?? buildDocumentId(sourcePath, contentFingerprint, resolvedTitle),
        sourcePath,
        collection: collection ?? "other",
        title: resolvedTitle,
        year,
        doctrine,
        tags: mergeTags(...chain.map(([, c]) => tagList(c.tags))),
      },
      ocr,
      warnings,
    };
  }
}

function embeddedCandidate(embedded: Record<string, unknown>): MetadataCandidate | null {
  if (Object.keys(embedded).length === 0) return null;
  return {
    documentId: embedded.document_id,
    title: embedded.title,
    collection: embedded.collection,
    year: embedded.year,
    doctrine: embedded.doctrine,
    tags: embedded.tags,
  };
}

function sidecarWarning(sidecarPath: string, message: string): MetadataWarning {
  return { field: "sidecar", value: sidecarPath, source: "sidecar", message };
}
