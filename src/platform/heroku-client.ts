import { z } from "zod";
import { PlatformError } from "../lib/errors.js";
import { assertStatus, DEFAULT_REQUEST_TIMEOUT_MS, FetchLike, readBodyText, readJson, truncateBody } from "../lib/http-client.js";

const appSchema = z.object({
  name: z.string(),
  web_url: z.string().nullish()
});

const releaseSchema = z.object({
  version: z.number().int(),
  status: z.enum(["failed", "pending", "succeeded"]),
  description: z.string().nullish()
});

export type HerokuRelease = z.infer<typeof releaseSchema>;

interface HerokuClientOptions {
  apiKey: string;
  apiUrl?: string;
  fetchImpl?: FetchLike;
  timeoutMs?: number;
}

export class HerokuClient {
  private readonly apiKey: string;
  private readonly apiUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;

  constructor(options: HerokuClientOptions) {
    this.apiKey = options.apiKey;
    this.apiUrl = (options.apiUrl || "https://api.heroku.com").replace(/\/$/, "");
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  private headers(extra: Record<string, string> = {}): Record<string, string> {
    return {
      Authorization: `Bearer ${this.apiKey}`,
      Accept: "application/vnd.heroku+json; version=3",
      "Content-Type": "application/json",
      ...extra
    };
  }

  /** Creates a container-stack app. Only a 201 counts as success. */
  async createApp(name: string): Promise<{ name: string; webUrl: string | null }> {
    const url = `${this.apiUrl}/apps`;
    const response = await this.fetchImpl(url, {
      method: "POST",
      headers: this.headers(),
      body: JSON.stringify({ name, stack: "container" }),
      signal: AbortSignal.timeout(this.timeoutMs)
    });

    if (response.status !== 201) {
      const body = await readBodyText(response);
      throw new PlatformError(`Failed to create Heroku app '${name}' (${response.status}): ${truncateBody(body)}`, {
        status: response.status,
        appName: name
      });
    }

    const parsed = appSchema.parse(await readJson(response));
    return { name: parsed.name, webUrl: parsed.web_url ?? null };
  }

  /** Newest release first, or null when the app has none yet. */
  async latestRelease(appName: string): Promise<HerokuRelease | null> {
    const url = `${this.apiUrl}/apps/${encodeURIComponent(appName)}/releases`;
    const response = await this.fetchImpl(url, {
      method: "GET",
      headers: this.headers({ Range: "version ..; order=desc, max=1" }),
      signal: AbortSignal.timeout(this.timeoutMs)
    });

    await assertStatus(response, { method: "GET", url }, (status) => status === 200 || status === 206);
    const releases = z.array(releaseSchema).parse(await readJson(response));
    return releases[0] ?? null;
  }
}
