import { z } from "zod";
import { GenerationError } from "../lib/errors.js";
import { FetchLike, readBodyText, truncateBody } from "../lib/http-client.js";
import { ChatMessage } from "../types.js";

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.unknown() }).optional()
      })
    )
    .optional()
});

export interface ChatCompletionClient {
  readonly model: string;
  complete(messages: ChatMessage[]): Promise<string>;
}

interface OpenAIChatClientOptions {
  apiKey: string;
  model: string;
  baseUrl?: string;
  temperature?: number;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

export class OpenAIChatClient implements ChatCompletionClient {
  readonly model: string;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly temperature: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: OpenAIChatClientOptions) {
    this.apiKey = options.apiKey;
    this.model = options.model;
    this.baseUrl = (options.baseUrl || "https://api.openai.com/v1").replace(/\/$/, "");
    this.temperature = options.temperature ?? 0.2;
    this.timeoutMs = options.timeoutMs ?? 90_000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async complete(messages: ChatMessage[]): Promise<string> {
    const response = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.apiKey}`
      },
      body: JSON.stringify({
        model: this.model,
        temperature: this.temperature,
        messages
      }),
      signal: AbortSignal.timeout(this.timeoutMs)
    });

    if (!response.ok) {
      const details = await readBodyText(response);
      throw new GenerationError(`Completion request failed (${response.status}): ${truncateBody(details)}`, {
        status: response.status
      });
    }

    const payload = completionSchema.parse(await response.json());
    const content = flattenContent(payload.choices?.[0]?.message?.content).trim();

    if (!content) {
      throw new GenerationError("Completion returned an empty message.");
    }

    return content;
  }
}

function flattenContent(input: unknown): string {
  if (typeof input === "string") {
    return input;
  }

  if (Array.isArray(input)) {
    return input
      .map((part) => {
        if (typeof part === "string") {
          return part;
        }
        if (part && typeof part === "object" && "text" in part) {
          return String(part.text);
        }
        return "";
      })
      .join("");
  }

  return "";
}
