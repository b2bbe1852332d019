import { z } from "zod";

/** Sidecar `<file>.meta.json|yml`. Every field is optional; values are validated later. */
export const SidecarMetadataSchema = z
  .object({
    document_id: z.string().min(1).optional(),
    title: z.string().optional().nullable(),
    collection: z.string().optional().nullable(),
    year: z.union([z.number(), z.string()]).optional().nullable(),
    doctrine: z.string().optional().nullable(),
    tags: z.union([z.array(z.string()), z.string()]).optional().nullable(),
    ocr: z.boolean().optional(),
  })
  .passthrough();

export type SidecarMetadata = z.infer<typeof SidecarMetadataSchema>;

/** One memory as returned by the backend. Accepts the `id`/`memory_id` spellings. */
export const BackendMemorySchema = z
  .object({
    id: z.string().optional(),
    memory_id: z.string().optional(),
    memory: z.string().default(""),
    user_id: z.string().optional(),
    scope: z.string().optional().nullable(),
    tags: z.array(z.string()).optional().nullable(),
    source: z.string().optional().nullable(),
    importance: z.number().optional().nullable(),
    created_at: z.string().optional().nullable(),
    decayed_at: z.string().optional().nullable(),
    score: z.number().optional().nullable(),
  })
  .passthrough()
  .refine((m) => Boolean(m.id ?? m.memory_id), { message: "memory without id" });

export type BackendMemory = z.infer<typeof BackendMemorySchema>;

export const BackendListSchema = z.object({
  results: z.array(BackendMemorySchema).default([]),
});

export const BackendAddSchema = z
  .object({
    id: z.string().optional(),
    memory_id: z.string().optional(),
    status: z.string().optional(),
  })
  .passthrough();

export const BackendDeleteSchema = z
  .object({
    status: z.string().optional(),
  })
  .passthrough();

/** Row metadata persisted alongside each indexed chunk. */
export const StoredChunkMetadataSchema = z.object({
  document_id: z.string(),
  source: z.string(),
  collection: z.string(),
  title: z.string(),
  year: z.number().nullable(),
  doctrine: z.string().nullable(),
  tags: z.array(z.string()),
});

export type StoredChunkMetadata = z.infer<typeof StoredChunkMetadataSchema>;

/** pdf-parse result (subset we use). */
export const PdfParseResultSchema = z
  .object({
    text: z.string(),
    numpages: z.number().optional(),
    info: z.record(z.unknown()).optional().nullable(),
  })
  .passthrough();

/** Embedding vector as stored in the index. */
export const VectorSchema = z.array(z.number());
