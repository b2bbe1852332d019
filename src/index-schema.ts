export const INDEX_SCHEMA_VERSION = 1 as const;

export const INDEX_TABLES_SQL = `
CREATE TABLE IF NOT EXISTS meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS chunks (
  document_id TEXT NOT NULL,
  chunk_index INTEGER NOT NULL,
  chunk_id TEXT NOT NULL UNIQUE,
  chunk_count INTEGER NOT NULL,
  source_path TEXT NOT NULL,
  collection TEXT NOT NULL,
  text TEXT NOT NULL,
  ocr INTEGER NOT NULL DEFAULT 0,
  metadata TEXT NOT NULL,
  vector TEXT NOT NULL,
  PRIMARY KEY (document_id, chunk_index)
);

CREATE INDEX IF NOT EXISTS chunks_collection ON chunks(collection);
CREATE INDEX IF NOT EXISTS chunks_source_path ON chunks(source_path);
`;
