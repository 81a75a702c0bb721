import { DeploymentLedger } from "../ledger/types.js";
import { AuxiliaryError } from "../lib/errors.js";
import { DEFAULT_REQUEST_TIMEOUT_MS, FetchLike, readBodyText, truncateBody } from "../lib/http-client.js";
import { logInfo } from "../lib/logging.js";
import { MaterialLinks } from "../types.js";

export interface MaterialRequest {
  uniqueId: string;
  prompt: string;
  pitchDeck: boolean;
  document: boolean;
}

interface MaterialTriggerOptions {
  webhookUrl: string;
  ledger: DeploymentLedger;
  fetchImpl?: FetchLike;
  timeoutMs?: number;
}

/**
 * Hands pitch-deck and document generation to an external automation. The
 * automation writes its result URLs into the ledger row on its own schedule.
 */
export class MaterialTrigger {
  private readonly webhookUrl: string;
  private readonly ledger: DeploymentLedger;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;

  constructor(options: MaterialTriggerOptions) {
    this.webhookUrl = options.webhookUrl;
    this.ledger = options.ledger;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  /** Returns false without calling out when neither material was asked for. */
  async trigger(request: MaterialRequest): Promise<boolean> {
    if (!request.pitchDeck && !request.document) {
      return false;
    }

    let response: Response;
    try {
      response = await this.fetchImpl(this.webhookUrl, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          unique_id: request.uniqueId,
          app_prompt: request.prompt,
          pitch_deck: request.pitchDeck,
          document: request.document
        }),
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (error) {
      throw new AuxiliaryError(
        `Material webhook unreachable: ${error instanceof Error ? error.message : String(error)}`,
        { uniqueId: request.uniqueId },
        { cause: error }
      );
    }

    if (!response.ok) {
      const body = await readBodyText(response);
      throw new AuxiliaryError(`Material webhook rejected the request (${response.status}): ${truncateBody(body)}`, {
        uniqueId: request.uniqueId,
        status: response.status
      });
    }

    await response.body?.cancel();
    logInfo("materials.requested", {
      uniqueId: request.uniqueId,
      pitchDeck: request.pitchDeck,
      document: request.document
    });
    return true;
  }

  /** Scans the whole ledger and picks the row for `uniqueId` client-side. */
  async readLinks(uniqueId: string): Promise<MaterialLinks> {
    const rows = await this.ledger.listAll();
    const row = rows.find((entry) => entry.uniqueId === uniqueId);

    return {
      uniqueId,
      pitchDeckUrl: row?.pitchDeckUrl ?? null,
      documentUrl: row?.documentUrl ?? null
    };
  }
}
