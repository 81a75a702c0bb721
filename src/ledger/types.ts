import { DeploymentRecord, DeploymentRecordPatch } from "../types.js";

export const LEDGER_IN_PROGRESS = "In Progress";
export const LEDGER_DONE = "Done";

/**
 * One row per deployment attempt, keyed by the identifier minted at
 * generation time. Status only moves forward: In Progress, then Done.
 */
export interface DeploymentLedger {
  readonly driver: "airtable" | "postgres";
  initialize(): Promise<void>;
  insert(record: DeploymentRecord): Promise<DeploymentRecord>;
  findByUniqueId(uniqueId: string): Promise<DeploymentRecord | null>;
  update(uniqueId: string, patch: DeploymentRecordPatch): Promise<DeploymentRecord>;
  markDone(uniqueId: string, patch?: DeploymentRecordPatch): Promise<DeploymentRecord>;
  listAll(): Promise<DeploymentRecord[]>;
  close(): Promise<void>;
}
