import { Pool, QueryResultRow } from "pg";
import { z } from "zod";
import { LedgerError } from "../lib/errors.js";
import { logInfo } from "../lib/logging.js";
import { DeploymentRecord, DeploymentRecordPatch } from "../types.js";
import { DeploymentLedger, LEDGER_DONE, LEDGER_IN_PROGRESS } from "./types.js";

export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: QueryResultRow[] }>;
  end?(): Promise<void>;
}

const rowSchema = z.object({
  unique_id: z.string(),
  app_prompt: z.string(),
  repo_name: z.string(),
  status: z.enum([LEDGER_IN_PROGRESS, LEDGER_DONE]),
  pitch_deck: z.boolean(),
  document: z.boolean(),
  pitch_deck_url: z.string().nullable(),
  document_url: z.string().nullable(),
  app_url: z.string().nullable(),
  created_time: z.union([z.string(), z.date()])
});

const schemaSql = `
CREATE TABLE IF NOT EXISTS deployment_records (
  unique_id TEXT PRIMARY KEY,
  app_prompt TEXT NOT NULL,
  repo_name TEXT NOT NULL,
  status TEXT NOT NULL CHECK (status IN ('${LEDGER_IN_PROGRESS}', '${LEDGER_DONE}')),
  pitch_deck BOOLEAN NOT NULL DEFAULT FALSE,
  document BOOLEAN NOT NULL DEFAULT FALSE,
  pitch_deck_url TEXT,
  document_url TEXT,
  app_url TEXT,
  created_time TIMESTAMPTZ NOT NULL DEFAULT NOW()
);
`;

const selectColumns =
  "unique_id, app_prompt, repo_name, status, pitch_deck, document, pitch_deck_url, document_url, app_url, created_time";

function toRecord(raw: QueryResultRow): DeploymentRecord {
  const row = rowSchema.parse(raw);
  return {
    uniqueId: row.unique_id,
    prompt: row.app_prompt,
    repoName: row.repo_name,
    status: row.status,
    pitchDeck: row.pitch_deck,
    document: row.document,
    pitchDeckUrl: row.pitch_deck_url,
    documentUrl: row.document_url,
    appUrl: row.app_url,
    createdTime: row.created_time instanceof Date ? row.created_time.toISOString() : row.created_time
  };
}

export class PostgresLedger implements DeploymentLedger {
  readonly driver = "postgres" as const;
  private readonly pool: Queryable;
  private readonly ownsPool: boolean;

  constructor(input: { databaseUrl: string } | { pool: Queryable }) {
    if ("pool" in input) {
      this.pool = input.pool;
      this.ownsPool = false;
    } else {
      this.pool = new Pool({ connectionString: input.databaseUrl });
      this.ownsPool = true;
    }
  }

  private async guard<T>(action: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      if (error instanceof LedgerError) {
        throw error;
      }
      throw new LedgerError(`Ledger ${action} failed: ${error instanceof Error ? error.message : String(error)}`, undefined, {
        cause: error
      });
    }
  }

  async initialize(): Promise<void> {
    await this.guard("initialize", () => this.pool.query(schemaSql));
  }

  async close(): Promise<void> {
    if (this.ownsPool && this.pool.end) {
      await this.pool.end();
    }
  }

  async insert(record: DeploymentRecord): Promise<DeploymentRecord> {
    return this.guard("insert", async () => {
      const result = await this.pool.query(
        `INSERT INTO deployment_records (unique_id, app_prompt, repo_name, status, pitch_deck, document, created_time)
         VALUES ($1, $2, $3, $4, $5, $6, $7)
         RETURNING ${selectColumns}`,
        [
          record.uniqueId,
          record.prompt,
          record.repoName,
          LEDGER_IN_PROGRESS,
          record.pitchDeck,
          record.document,
          record.createdTime
        ]
      );

      const row = result.rows[0];
      if (!row) {
        throw new LedgerError("Insert returned no row.", { uniqueId: record.uniqueId });
      }
      logInfo("ledger.inserted", { driver: this.driver, uniqueId: record.uniqueId });
      return toRecord(row);
    });
  }

  async findByUniqueId(uniqueId: string): Promise<DeploymentRecord | null> {
    return this.guard("lookup", async () => {
      const result = await this.pool.query(
        `SELECT ${selectColumns} FROM deployment_records WHERE unique_id = $1`,
        [uniqueId]
      );
      const row = result.rows[0];
      return row ? toRecord(row) : null;
    });
  }

  async update(uniqueId: string, patch: DeploymentRecordPatch): Promise<DeploymentRecord> {
    return this.guard("update", async () => {
      const result = await this.pool.query(
        `UPDATE deployment_records
         SET repo_name = COALESCE($2, repo_name),
             pitch_deck_url = COALESCE($3, pitch_deck_url),
             document_url = COALESCE($4, document_url),
             app_url = COALESCE($5, app_url)
         WHERE unique_id = $1
         RETURNING ${selectColumns}`,
        [uniqueId, patch.repoName ?? null, patch.pitchDeckUrl ?? null, patch.documentUrl ?? null, patch.appUrl ?? null]
      );
      const row = result.rows[0];
      if (!row) {
        throw new LedgerError(`No ledger row for ${uniqueId}.`, { uniqueId });
      }
      return toRecord(row);
    });
  }

  /** Only rows still In Progress are touched, so a Done row can never move back. */
  async markDone(uniqueId: string, patch: DeploymentRecordPatch = {}): Promise<DeploymentRecord> {
    return this.guard("status update", async () => {
      const result = await this.pool.query(
        `UPDATE deployment_records
         SET status = $2,
             repo_name = COALESCE($3, repo_name),
             app_url = COALESCE($4, app_url)
         WHERE unique_id = $1 AND status = $5
         RETURNING ${selectColumns}`,
        [uniqueId, LEDGER_DONE, patch.repoName ?? null, patch.appUrl ?? null, LEDGER_IN_PROGRESS]
      );

      const updated = result.rows[0];
      if (updated) {
        logInfo("ledger.marked_done", { driver: this.driver, uniqueId });
        return toRecord(updated);
      }

      const existing = await this.findByUniqueId(uniqueId);
      if (!existing) {
        throw new LedgerError(`No ledger row for ${uniqueId}.`, { uniqueId });
      }
      return existing;
    });
  }

  async listAll(): Promise<DeploymentRecord[]> {
    return this.guard("scan", async () => {
      const result = await this.pool.query(
        `SELECT ${selectColumns} FROM deployment_records ORDER BY created_time ASC`
      );
      return result.rows.map(toRecord);
    });
  }
}
