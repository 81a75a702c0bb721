import { z } from "zod";
import { assertStatus, FetchLike, HttpStatusError, readJson, DEFAULT_REQUEST_TIMEOUT_MS } from "../lib/http-client.js";
import { RemoteRepository } from "../types.js";

const repositorySchema = z.object({
  name: z.string(),
  full_name: z.string(),
  html_url: z.string(),
  default_branch: z.string().nullish(),
  owner: z.object({ login: z.string() })
});

const repositoryListSchema = z.array(z.object({ name: z.string() }));
const contentSchema = z.object({ sha: z.string() });
const putContentSchema = z.object({ content: z.object({ sha: z.string() }) });
const publicKeySchema = z.object({ key: z.string().min(1), key_id: z.string().min(1) });

export interface ActionsPublicKey {
  key: string;
  keyId: string;
}

interface GitHubClientOptions {
  token: string;
  apiUrl?: string;
  fetchImpl?: FetchLike;
  timeoutMs?: number;
}

/** Raised when the account already owns a repository with the requested name. */
export class RepositoryNameTakenError extends Error {
  readonly repoName: string;

  constructor(repoName: string) {
    super(`A repository named '${repoName}' already exists.`);
    this.name = "RepositoryNameTakenError";
    this.repoName = repoName;
  }
}

function toRepository(raw: unknown): RemoteRepository {
  const parsed = repositorySchema.parse(raw);
  return {
    owner: parsed.owner.login,
    name: parsed.name,
    fullName: parsed.full_name,
    htmlUrl: parsed.html_url,
    defaultBranch: parsed.default_branch || "main"
  };
}

function encodeContentPath(filePath: string): string {
  return filePath
    .split("/")
    .filter(Boolean)
    .map((segment) => encodeURIComponent(segment))
    .join("/");
}

export class GitHubClient {
  private readonly token: string;
  private readonly apiUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;

  constructor(options: GitHubClientOptions) {
    this.token = options.token;
    this.apiUrl = (options.apiUrl || "https://api.github.com").replace(/\/$/, "");
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  private async send(method: string, pathname: string, body?: unknown): Promise<{ response: Response; url: string }> {
    const url = `${this.apiUrl}${pathname}`;
    const response = await this.fetchImpl(url, {
      method,
      headers: {
        Authorization: `Bearer ${this.token}`,
        Accept: "application/vnd.github+json",
        "User-Agent": "idea2deploy",
        "X-GitHub-Api-Version": "2022-11-28",
        ...(body !== undefined ? { "Content-Type": "application/json" } : {})
      },
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: AbortSignal.timeout(this.timeoutMs)
    });
    return { response, url };
  }

  async listOwnedRepositoryNames(): Promise<string[]> {
    const names: string[] = [];
    const perPage = 100;

    for (let page = 1; ; page += 1) {
      const { response, url } = await this.send("GET", `/user/repos?affiliation=owner&per_page=${perPage}&page=${page}`);
      await assertStatus(response, { method: "GET", url });
      const repos = repositoryListSchema.parse(await readJson(response));
      names.push(...repos.map((repo) => repo.name));
      if (repos.length < perPage) {
        return names;
      }
    }
  }

  async createRepository(name: string, options: { private?: boolean; description?: string } = {}): Promise<RemoteRepository> {
    const { response, url } = await this.send("POST", "/user/repos", {
      name,
      private: options.private ?? false,
      description: options.description,
      auto_init: false
    });

    if (response.status === 422) {
      const text = await response.text();
      if (/already exists/i.test(text)) {
        throw new RepositoryNameTakenError(name);
      }
      throw new HttpStatusError({ method: "POST", url, status: response.status, body: text });
    }

    await assertStatus(response, { method: "POST", url });
    return toRepository(await readJson(response));
  }

  async getFileSha(repo: RemoteRepository, filePath: string, ref?: string): Promise<string | null> {
    const query = ref ? `?ref=${encodeURIComponent(ref)}` : "";
    const { response, url } = await this.send("GET", `/repos/${repo.fullName}/contents/${encodeContentPath(filePath)}${query}`);
    if (response.status === 404) {
      return null;
    }
    await assertStatus(response, { method: "GET", url });
    return contentSchema.parse(await readJson(response)).sha;
  }

  /** Creates or updates one file as its own commit; `sha` is required when the file exists. */
  async putFile(
    repo: RemoteRepository,
    input: { path: string; content: string; message: string; sha?: string | null; branch?: string }
  ): Promise<string> {
    const { response, url } = await this.send("PUT", `/repos/${repo.fullName}/contents/${encodeContentPath(input.path)}`, {
      message: input.message,
      content: Buffer.from(input.content, "utf8").toString("base64"),
      ...(input.sha ? { sha: input.sha } : {}),
      ...(input.branch ? { branch: input.branch } : {})
    });
    await assertStatus(response, { method: "PUT", url });
    return putContentSchema.parse(await readJson(response)).content.sha;
  }

  async getActionsPublicKey(repo: RemoteRepository): Promise<ActionsPublicKey> {
    const { response, url } = await this.send("GET", `/repos/${repo.fullName}/actions/secrets/public-key`);
    await assertStatus(response, { method: "GET", url });
    const parsed = publicKeySchema.parse(await readJson(response));
    return { key: parsed.key, keyId: parsed.key_id };
  }

  async putActionsSecret(repo: RemoteRepository, secretName: string, encryptedValue: string, keyId: string): Promise<void> {
    const { response, url } = await this.send("PUT", `/repos/${repo.fullName}/actions/secrets/${encodeURIComponent(secretName)}`, {
      encrypted_value: encryptedValue,
      key_id: keyId
    });
    await assertStatus(response, { method: "PUT", url });
  }

  /** Returns the response status so callers can retry while a new workflow is still being indexed. */
  async dispatchWorkflow(repo: RemoteRepository, workflowFile: string, ref: string): Promise<number> {
    const { response, url } = await this.send(
      "POST",
      `/repos/${repo.fullName}/actions/workflows/${encodeURIComponent(workflowFile)}/dispatches`,
      { ref }
    );

    if (response.status === 404 || response.status === 422) {
      await response.text();
      return response.status;
    }

    await assertStatus(response, { method: "POST", url });
    return response.status;
  }
}
