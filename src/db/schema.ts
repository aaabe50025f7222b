/**
 * Run history schema, shared by the SQLite and PostgreSQL backends.
 */
export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS runs (
  id TEXT PRIMARY KEY,
  input_path TEXT NOT NULL,
  status TEXT NOT NULL,
  record_count INTEGER NOT NULL DEFAULT 0,
  created_count INTEGER NOT NULL DEFAULT 0,
  deleted_count INTEGER NOT NULL DEFAULT 0,
  tag TEXT,
  build_state TEXT,
  error_kind TEXT,
  error TEXT,
  manual_action TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS run_logs (
  id TEXT PRIMARY KEY,
  run_id TEXT NOT NULL REFERENCES runs (id),
  level TEXT NOT NULL,
  step TEXT NOT NULL,
  message TEXT NOT NULL,
  percent INTEGER NOT NULL DEFAULT 0,
  created_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_run_logs_run_id ON run_logs (run_id);

CREATE TABLE IF NOT EXISTS run_commits (
  run_id TEXT NOT NULL REFERENCES runs (id),
  seq INTEGER NOT NULL,
  commit_id TEXT NOT NULL,
  reverted INTEGER NOT NULL DEFAULT 0,
  PRIMARY KEY (run_id, seq)
);
`;
