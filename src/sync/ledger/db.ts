import Database from "better-sqlite3";
import path from "path";

const SCHEMA = `
CREATE TABLE IF NOT EXISTS sync_mappings (
  portal_id TEXT PRIMARY KEY,
  calendar_event_id TEXT UNIQUE,
  idempotency_token TEXT NOT NULL UNIQUE,
  last_fingerprint TEXT,
  sync_status TEXT NOT NULL DEFAULT 'pending',
  last_synced_at TEXT,
  appointment_start TEXT,
  appointment_end TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS conflict_log (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  conflict_key TEXT NOT NULL UNIQUE,
  run_id TEXT NOT NULL,
  kind TEXT NOT NULL,
  resolution TEXT NOT NULL,
  reason TEXT NOT NULL,
  records_json TEXT NOT NULL,
  detected_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_conflict_detected ON conflict_log(detected_at);

CREATE TABLE IF NOT EXISTS sync_runs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  run_id TEXT NOT NULL UNIQUE,
  started_at TEXT NOT NULL,
  completed_at TEXT,
  trigger TEXT NOT NULL,
  dry_run INTEGER NOT NULL DEFAULT 0,
  report_json TEXT,
  status TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_runs_started ON sync_runs(started_at);

CREATE TABLE IF NOT EXISTS sync_lease (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  holder TEXT NOT NULL,
  trigger TEXT NOT NULL,
  acquired_at TEXT NOT NULL,
  expires_at TEXT NOT NULL,
  cancel_requested INTEGER NOT NULL DEFAULT 0
);

CREATE TABLE IF NOT EXISTS sync_state (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL,
  updated_at TEXT NOT NULL
);
`;

// Columns added after the first release; ledgers created before them are altered in place.
const ADDED_COLUMNS: { table: string; column: string; definition: string }[] = [
  { table: "sync_mappings", column: "appointment_start", definition: "TEXT" },
  { table: "sync_mappings", column: "appointment_end", definition: "TEXT" },
];

function migrate(db: Database.Database): void {
  for (const { table, column, definition } of ADDED_COLUMNS) {
    const columns = db.pragma(`table_info(${table})`) as { name: string }[];
    if (!columns.some((c) => c.name === column)) {
      db.exec(`ALTER TABLE ${table} ADD COLUMN ${column} ${definition}`);
    }
  }
  db.exec("CREATE INDEX IF NOT EXISTS idx_mappings_end ON sync_mappings(appointment_end)");
}

let _db: Database.Database | null = null;

function resolveLedgerPath(): string {
  const configured = process.env.SYNC_LEDGER_PATH;
  if (configured === ":memory:") return configured;
  return configured
    ? path.resolve(configured)
    : path.resolve(process.cwd(), "sync_ledger.db");
}

export function getDatabase(): Database.Database {
  if (!_db) {
    const dbPath = resolveLedgerPath();
    _db = new Database(dbPath);
    _db.pragma("journal_mode = WAL");
    _db.exec(SCHEMA);
    migrate(_db);
  }
  return _db;
}

export function closeDatabase(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}
