export const CREATE_TABLES_SQL = `
CREATE TABLE IF NOT EXISTS vector_records (
  filename TEXT PRIMARY KEY NOT NULL,
  checksum TEXT NOT NULL,
  ingest_timestamp TEXT NOT NULL,
  chunk_size INTEGER,
  chunk_overlap INTEGER,
  embedding_model TEXT,
  embedding_dimension INTEGER
);

CREATE TABLE IF NOT EXISTS vector_chunks (
  filename TEXT NOT NULL,
  chunk_index INTEGER NOT NULL,
  char_start INTEGER NOT NULL,
  char_end INTEGER NOT NULL,
  snippet TEXT NOT NULL,
  embedding_dim INTEGER NOT NULL,
  embedding_b64 TEXT NOT NULL,
  PRIMARY KEY (filename, chunk_index)
);

CREATE INDEX IF NOT EXISTS idx_vector_chunks_filename ON vector_chunks (filename);
`;
