// packages/decision/src/sqlite-exporter.ts
import Database from "better-sqlite3";
import { ExportError, errorMessage } from "./errors.js";
import { SerialQueue, type DecisionExporter, type ExportResult } from "./exporter.js";
import { computeRecordHash } from "./hash.js";
import { DecisionRecordSchema, type DecisionRecord } from "./record.js";

type RecordRow = {
  seq: number;
  decision_id: string;
  record_json: string;
  record_hash: string;
};

export type StoredDecisionRow = {
  seq: number;
  decision_id: string;
  record_hash: string;
  record_json: string;
};

function sqliteCode(e: unknown): string | null {
  if (typeof e === "object" && e !== null && "code" in e && typeof e.code === "string") return e.code;
  return null;
}

/**
 * SQLite sink. One row per record; decision_id is the primary key so a second
 * append of the same id is refused instead of overwriting.
 */
export class SqliteDecisionExporter implements DecisionExporter {
  readonly name: string;
  private db: Database.Database;
  private readonly queue = new SerialQueue();
  private closed = false;

  constructor(filename = "decision-trace.sqlite", opts: { name?: string } = {}) {
    this.name = opts.name ?? `sqlite:${filename}`;
    this.db = new Database(filename);
    this.db.pragma("journal_mode = WAL");
    this.migrate();
  }

  private migrate() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS decision_records (
        seq           INTEGER PRIMARY KEY AUTOINCREMENT,
        decision_id   TEXT NOT NULL UNIQUE,
        decision_type TEXT NOT NULL,
        tenant_id     TEXT NOT NULL,
        environment   TEXT NOT NULL,
        timestamp     TEXT NOT NULL,
        record_json   TEXT NOT NULL,
        record_hash   TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_records_scope
        ON decision_records(tenant_id, environment, seq);
    `);
  }

  append(record: DecisionRecord): Promise<ExportResult> {
    return this.queue.run(async (): Promise<ExportResult> => {
      if (this.closed) {
        return {
          ok: false,
          error: new ExportError(this.name, record.decision_id, "CLOSED", "exporter is closed"),
        };
      }

      try {
        this.db
          .prepare(
            `INSERT INTO decision_records(decision_id, decision_type, tenant_id, environment, timestamp, record_json, record_hash)
             VALUES (?, ?, ?, ?, ?, ?, ?)`
          )
          .run(
            record.decision_id,
            record.decision_type,
            record.tenant_id,
            record.environment,
            record.timestamp,
            JSON.stringify(record),
            computeRecordHash(record)
          );
        return { ok: true };
      } catch (e) {
        const code = sqliteCode(e);
        const duplicate = code !== null && code.startsWith("SQLITE_CONSTRAINT");
        return {
          ok: false,
          error: new ExportError(
            this.name,
            record.decision_id,
            duplicate ? "DUPLICATE" : "APPEND_FAILED",
            duplicate ? `decision_id already stored: ${record.decision_id}` : errorMessage(e),
            { cause: e }
          ),
        };
      }
    });
  }

  /**
   * Raw rows in insertion order (tenant/environment filter optional).
   */
  listRows(scope: { tenant_id?: string; environment?: string } = {}): StoredDecisionRow[] {
    const rows = this.db
      .prepare<[string | null, string | null, string | null, string | null], RecordRow>(
        `SELECT seq, decision_id, record_json, record_hash
         FROM decision_records
         WHERE (? IS NULL OR tenant_id = ?)
           AND (? IS NULL OR environment = ?)
         ORDER BY seq ASC`
      )
      .all(scope.tenant_id ?? null, scope.tenant_id ?? null, scope.environment ?? null, scope.environment ?? null);

    return rows.map((r) => ({
      seq: r.seq,
      decision_id: r.decision_id,
      record_hash: r.record_hash,
      record_json: r.record_json,
    }));
  }

  listRecords(scope: { tenant_id?: string; environment?: string } = {}): DecisionRecord[] {
    return this.listRows(scope).map((r) => DecisionRecordSchema.parse(JSON.parse(r.record_json)));
  }

  async flush(): Promise<void> {
    await this.queue.drain();
  }

  close(): Promise<void> {
    return this.queue.run(async () => {
      if (this.closed) return;
      this.closed = true;
      this.db.close();
    });
  }
}
