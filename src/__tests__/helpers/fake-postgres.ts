import type { QueryResultRow } from "pg";
import type { Queryable } from "../../ledger/postgres-ledger.js";

type StoredRow = {
  unique_id: string;
  app_prompt: string;
  repo_name: string;
  status: string;
  pitch_deck: boolean;
  document: boolean;
  pitch_deck_url: string | null;
  document_url: string | null;
  app_url: string | null;
  created_time: string;
};

function text(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

/**
 * Understands exactly the statements the Postgres ledger sends. Anything
 * else throws so a changed query shows up as a test failure.
 */
export class InMemoryQueryable implements Queryable {
  readonly rows = new Map<string, StoredRow>();
  readonly statements: string[] = [];
  ended = false;
  private pendingFailure: Error | null = null;

  failNext(error: Error): void {
    this.pendingFailure = error;
  }

  /** Sets the URL columns the way the external automation does. */
  attachMaterials(uniqueId: string, urls: { pitchDeckUrl?: string; documentUrl?: string }): void {
    const row = this.rows.get(uniqueId);
    if (!row) {
      throw new Error(`No row ${uniqueId}`);
    }
    row.pitch_deck_url = urls.pitchDeckUrl ?? row.pitch_deck_url;
    row.document_url = urls.documentUrl ?? row.document_url;
  }

  async query(sqlText: string, values: unknown[] = []): Promise<{ rows: QueryResultRow[] }> {
    const sql = sqlText.trim().replace(/\s+/g, " ");
    this.statements.push(sql.split(" ").slice(0, 2).join(" "));

    if (this.pendingFailure) {
      const failure = this.pendingFailure;
      this.pendingFailure = null;
      throw failure;
    }

    if (sql.startsWith("CREATE TABLE")) {
      return { rows: [] };
    }

    const uniqueId = String(values[0]);

    if (sql.startsWith("INSERT INTO deployment_records")) {
      if (this.rows.has(uniqueId)) {
        throw new Error('duplicate key value violates unique constraint "deployment_records_pkey"');
      }
      const row: StoredRow = {
        unique_id: uniqueId,
        app_prompt: String(values[1]),
        repo_name: String(values[2]),
        status: String(values[3]),
        pitch_deck: values[4] === true,
        document: values[5] === true,
        pitch_deck_url: null,
        document_url: null,
        app_url: null,
        created_time: String(values[6])
      };
      this.rows.set(uniqueId, row);
      return { rows: [{ ...row }] };
    }

    if (sql.startsWith("SELECT") && sql.includes("ORDER BY created_time")) {
      const ordered = Array.from(this.rows.values()).sort((left, right) => left.created_time.localeCompare(right.created_time));
      return { rows: ordered.map((row) => ({ ...row })) };
    }

    if (sql.startsWith("SELECT") && sql.includes("WHERE unique_id = $1")) {
      const row = this.rows.get(uniqueId);
      return { rows: row ? [{ ...row }] : [] };
    }

    if (sql.startsWith("UPDATE deployment_records SET status = $2")) {
      const row = this.rows.get(uniqueId);
      if (!row || row.status !== values[4]) {
        return { rows: [] };
      }
      row.status = String(values[1]);
      row.repo_name = text(values[2]) ?? row.repo_name;
      row.app_url = text(values[3]) ?? row.app_url;
      return { rows: [{ ...row }] };
    }

    if (sql.startsWith("UPDATE deployment_records SET repo_name")) {
      const row = this.rows.get(uniqueId);
      if (!row) {
        return { rows: [] };
      }
      row.repo_name = text(values[1]) ?? row.repo_name;
      row.pitch_deck_url = text(values[2]) ?? row.pitch_deck_url;
      row.document_url = text(values[3]) ?? row.document_url;
      row.app_url = text(values[4]) ?? row.app_url;
      return { rows: [{ ...row }] };
    }

    throw new Error(`Unsupported statement: ${sql.slice(0, 60)}`);
  }

  async end(): Promise<void> {
    this.ended = true;
  }
}
