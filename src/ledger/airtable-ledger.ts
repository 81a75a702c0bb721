import { z } from "zod";
import { LedgerError } from "../lib/errors.js";
import { assertStatus, DEFAULT_REQUEST_TIMEOUT_MS, FetchLike, readJson } from "../lib/http-client.js";
import { logInfo } from "../lib/logging.js";
import { DeploymentRecord, DeploymentRecordPatch } from "../types.js";
import { DeploymentLedger, LEDGER_DONE, LEDGER_IN_PROGRESS } from "./types.js";

// Airtable leaves unchecked boxes and empty cells out of the payload entirely.
const fieldsSchema = z.object({
  unique_id: z.string(),
  app_prompt: z.string().default(""),
  repo_name_input: z.string().default(""),
  Status: z.enum([LEDGER_IN_PROGRESS, LEDGER_DONE]).default(LEDGER_IN_PROGRESS),
  pitch_deck: z.boolean().default(false),
  document: z.boolean().default(false),
  pitch_deck_url: z.string().nullish(),
  document_url: z.string().nullish(),
  app_url: z.string().nullish(),
  created_time: z.string().default("")
});

const recordSchema = z.object({
  id: z.string(),
  fields: fieldsSchema
});

const listSchema = z.object({
  records: z.array(z.unknown()),
  offset: z.string().optional()
});

type AirtableRow = { recordId: string; record: DeploymentRecord };

interface AirtableLedgerOptions {
  apiKey: string;
  baseId: string;
  tableName: string;
  apiUrl?: string;
  fetchImpl?: FetchLike;
  timeoutMs?: number;
}

function toRecord(raw: unknown): AirtableRow | null {
  const parsed = recordSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }

  const fields = parsed.data.fields;
  return {
    recordId: parsed.data.id,
    record: {
      uniqueId: fields.unique_id,
      prompt: fields.app_prompt,
      repoName: fields.repo_name_input,
      status: fields.Status,
      pitchDeck: fields.pitch_deck,
      document: fields.document,
      pitchDeckUrl: fields.pitch_deck_url ?? null,
      documentUrl: fields.document_url ?? null,
      appUrl: fields.app_url ?? null,
      createdTime: fields.created_time
    }
  };
}

function patchToFields(patch: DeploymentRecordPatch): Record<string, unknown> {
  const fields: Record<string, unknown> = {};
  if (patch.repoName !== undefined) {
    fields.repo_name_input = patch.repoName;
  }
  if (patch.pitchDeckUrl !== undefined) {
    fields.pitch_deck_url = patch.pitchDeckUrl;
  }
  if (patch.documentUrl !== undefined) {
    fields.document_url = patch.documentUrl;
  }
  if (patch.appUrl !== undefined) {
    fields.app_url = patch.appUrl;
  }
  return fields;
}

export function formulaLiteral(value: string): string {
  return `'${value.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;
}

export class AirtableLedger implements DeploymentLedger {
  readonly driver = "airtable" as const;
  private readonly apiKey: string;
  private readonly tableUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;

  constructor(options: AirtableLedgerOptions) {
    const apiUrl = (options.apiUrl || "https://api.airtable.com").replace(/\/$/, "");
    this.apiKey = options.apiKey;
    this.tableUrl = `${apiUrl}/v0/${encodeURIComponent(options.baseId)}/${encodeURIComponent(options.tableName)}`;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  async initialize(): Promise<void> {
    // The table is provisioned in Airtable itself.
  }

  async close(): Promise<void> {}

  private async request(method: string, url: string, body?: unknown): Promise<unknown> {
    const response = await this.fetchImpl(url, {
      method,
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        ...(body !== undefined ? { "Content-Type": "application/json" } : {})
      },
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: AbortSignal.timeout(this.timeoutMs)
    });
    await assertStatus(response, { method, url });
    return readJson(response);
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

  private async findRow(uniqueId: string): Promise<AirtableRow | null> {
    const formula = encodeURIComponent(`{unique_id}=${formulaLiteral(uniqueId)}`);
    const payload = listSchema.parse(await this.request("GET", `${this.tableUrl}?filterByFormula=${formula}&maxRecords=1`));
    const first = payload.records[0];
    return first === undefined ? null : toRecord(first);
  }

  private async requireRow(uniqueId: string): Promise<AirtableRow> {
    const row = await this.findRow(uniqueId);
    if (!row) {
      throw new LedgerError(`No ledger row for ${uniqueId}.`, { uniqueId });
    }
    return row;
  }

  private async patchRow(recordId: string, fields: Record<string, unknown>): Promise<DeploymentRecord> {
    const updated = toRecord(await this.request("PATCH", `${this.tableUrl}/${encodeURIComponent(recordId)}`, { fields }));
    if (!updated) {
      throw new LedgerError("Ledger returned an unreadable row after update.", { recordId });
    }
    return updated.record;
  }

  async insert(record: DeploymentRecord): Promise<DeploymentRecord> {
    return this.guard("insert", async () => {
      if (await this.findRow(record.uniqueId)) {
        throw new LedgerError(`Ledger row ${record.uniqueId} already exists.`, { uniqueId: record.uniqueId });
      }

      const created = toRecord(
        await this.request("POST", this.tableUrl, {
          fields: {
            unique_id: record.uniqueId,
            app_prompt: record.prompt,
            repo_name_input: record.repoName,
            Status: LEDGER_IN_PROGRESS,
            pitch_deck: record.pitchDeck,
            document: record.document,
            created_time: record.createdTime
          }
        })
      );
      if (!created) {
        throw new LedgerError("Ledger returned an unreadable row after insert.", { uniqueId: record.uniqueId });
      }

      logInfo("ledger.inserted", { driver: this.driver, uniqueId: record.uniqueId });
      return created.record;
    });
  }

  async findByUniqueId(uniqueId: string): Promise<DeploymentRecord | null> {
    return this.guard("lookup", async () => (await this.findRow(uniqueId))?.record ?? null);
  }

  async update(uniqueId: string, patch: DeploymentRecordPatch): Promise<DeploymentRecord> {
    return this.guard("update", async () => {
      const row = await this.requireRow(uniqueId);
      const fields = patchToFields(patch);
      if (Object.keys(fields).length === 0) {
        return row.record;
      }
      return this.patchRow(row.recordId, fields);
    });
  }

  async markDone(uniqueId: string, patch: DeploymentRecordPatch = {}): Promise<DeploymentRecord> {
    return this.guard("status update", async () => {
      const row = await this.requireRow(uniqueId);
      if (row.record.status === LEDGER_DONE) {
        return row.record;
      }

      const record = await this.patchRow(row.recordId, { ...patchToFields(patch), Status: LEDGER_DONE });
      logInfo("ledger.marked_done", { driver: this.driver, uniqueId });
      return record;
    });
  }

  /** Reads every row, following Airtable's offset cursor. */
  async listAll(): Promise<DeploymentRecord[]> {
    return this.guard("scan", async () => {
      const records: DeploymentRecord[] = [];
      let offset: string | undefined;

      do {
        const query = offset ? `?pageSize=100&offset=${encodeURIComponent(offset)}` : "?pageSize=100";
        const payload = listSchema.parse(await this.request("GET", `${this.tableUrl}${query}`));
        for (const raw of payload.records) {
          const row = toRecord(raw);
          if (row) {
            records.push(row.record);
          }
        }
        offset = payload.offset;
      } while (offset);

      return records;
    });
  }
}
