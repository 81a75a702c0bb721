import { LedgerConfig } from "../lib/config.js";
import { FetchLike } from "../lib/http-client.js";
import { AirtableLedger } from "./airtable-ledger.js";
import { PostgresLedger } from "./postgres-ledger.js";
import { DeploymentLedger } from "./types.js";

export function createLedger(config: LedgerConfig, fetchImpl?: FetchLike): DeploymentLedger {
  if (config.driver === "postgres") {
    return new PostgresLedger({ databaseUrl: config.databaseUrl });
  }

  return new AirtableLedger({
    apiKey: config.apiKey,
    baseId: config.baseId,
    tableName: config.tableName,
    apiUrl: config.apiUrl,
    fetchImpl
  });
}
