import Database from "better-sqlite3";
import type { LogEntry, LogLevel } from "@sdkpath/core";

export interface TraceQueryOptions {
  traceId?: string;
  level?: string;
  cmd?: string;
  scope?: string;
  op?: string;
  platform?: string;
  classification?: string;
  since?: number;
  limit?: number;
}

export interface TraceStoreOptions {
  maxRows?: number;
}

const COLUMNS = [
  "ts", "trace_id", "level", "cmd", "scope", "op",
  "platform", "volume", "classification", "language", "path",
  "msg", "dur", "error", "data",
] as const;

interface EventRow {
  ts: number;
  trace_id: string;
  level: LogLevel;
  cmd: string;
  scope: string;
  op: string;
  platform: string | null;
  volume: string | null;
  classification: string | null;
  language: string | null;
  path: string | null;
  msg: string;
  dur: number | null;
  error: string | null;
  data: string | null;
}

export class TraceStore {
  private db: Database.Database;
  private maxRows: number;
  private insertStmt: Database.Statement;

  constructor(dbPath: string, opts?: TraceStoreOptions) {
    this.maxRows = opts?.maxRows ?? 20_000;
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("synchronous = NORMAL");
    this.init();
    this.insertStmt = this.db.prepare(`
      INSERT INTO events (${COLUMNS.join(", ")})
      VALUES (${COLUMNS.map(() => "?").join(", ")})
    `);
  }

  private init(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS events (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        ts INTEGER NOT NULL,
        trace_id TEXT NOT NULL,
        level TEXT NOT NULL,
        cmd TEXT,
        scope TEXT,
        op TEXT,
        platform TEXT,
        volume TEXT,
        classification TEXT,
        language TEXT,
        path TEXT,
        msg TEXT NOT NULL,
        dur INTEGER,
        error TEXT,
        data TEXT
      );
      CREATE INDEX IF NOT EXISTS idx_trace ON events(trace_id);
      CREATE INDEX IF NOT EXISTS idx_level ON events(level);
      CREATE INDEX IF NOT EXISTS idx_cmd ON events(cmd);
      CREATE INDEX IF NOT EXISTS idx_classification ON events(classification);
      CREATE INDEX IF NOT EXISTS idx_ts ON events(ts);
    `);
  }

  insert(entry: LogEntry): void {
    this.insertStmt.run(
      entry.ts,
      entry.traceId,
      entry.level,
      entry.cmd,
      entry.scope,
      entry.op,
      entry.platform ?? null,
      entry.volume ?? null,
      entry.classification ?? null,
      entry.language ?? null,
      entry.path ?? null,
      entry.msg,
      entry.dur ?? null,
      entry.error ?? null,
      entry.data ? JSON.stringify(entry.data) : null,
    );
  }

  query(opts: TraceQueryOptions): LogEntry[] {
    const conditions: string[] = [];
    const params: (string | number)[] = [];

    const addFilter = (col: string, val: string | undefined) => {
      if (val !== undefined) {
        conditions.push(`${col} = ?`);
        params.push(val);
      }
    };

    addFilter("trace_id", opts.traceId);
    addFilter("level", opts.level);
    addFilter("cmd", opts.cmd);
    addFilter("scope", opts.scope);
    addFilter("op", opts.op);
    addFilter("platform", opts.platform);
    addFilter("classification", opts.classification);

    if (opts.since !== undefined) {
      conditions.push("ts >= ?");
      params.push(opts.since);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    params.push(opts.limit ?? 500);

    const rows = this.db
      .prepare<(string | number)[], EventRow>(`SELECT * FROM events ${where} ORDER BY ts DESC, id DESC LIMIT ?`)
      .all(...params);

    return rows.map(rowToEntry);
  }

  count(): number {
    const row = this.db.prepare<[], { c: number }>("SELECT COUNT(*) as c FROM events").get();
    return row?.c ?? 0;
  }

  vacuum(): void {
    const count = this.count();
    if (count > this.maxRows) {
      const deleteCount = count - this.maxRows;
      this.db.prepare("DELETE FROM events WHERE id IN (SELECT id FROM events ORDER BY ts ASC, id ASC LIMIT ?)").run(deleteCount);
    }
  }

  close(): void {
    this.db.close();
  }
}

function rowToEntry(row: EventRow): LogEntry {
  const entry: LogEntry = {
    ts: row.ts,
    traceId: row.trace_id,
    level: row.level,
    cmd: row.cmd,
    scope: row.scope,
    op: row.op,
    msg: row.msg,
  };
  if (row.platform !== null) entry.platform = row.platform;
  if (row.volume !== null) entry.volume = row.volume;
  if (row.classification !== null) entry.classification = row.classification;
  if (row.language !== null) entry.language = row.language;
  if (row.path !== null) entry.path = row.path;
  if (row.dur !== null) entry.dur = row.dur;
  if (row.error !== null) entry.error = row.error;
  if (row.data !== null) entry.data = parseData(row.data);
  return entry;
}

function parseData(raw: string): Record<string, unknown> | undefined {
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
    return Object.fromEntries(Object.entries(parsed));
  }
  return undefined;
}
