export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export class HttpStatusError extends Error {
  readonly method: string;
  readonly url: string;
  readonly status: number;
  readonly body: string;

  constructor(input: { method: string; url: string; status: number; body: string }) {
    super(`${input.method} ${input.url} failed (${input.status}): ${truncateBody(input.body)}`);
    this.name = "HttpStatusError";
    this.method = input.method;
    this.url = input.url;
    this.status = input.status;
    this.body = input.body;
  }
}

export function truncateBody(body: string, max = 400): string {
  const trimmed = body.trim();
  return trimmed.length > max ? `${trimmed.slice(0, max)}…` : trimmed;
}

export async function readBodyText(response: Response): Promise<string> {
  return response.text().catch(() => "");
}

/** Parses a response body as JSON; an empty body parses to `null`. */
export async function readJson(response: Response): Promise<unknown> {
  const text = await readBodyText(response);
  if (!text.trim()) {
    return null;
  }

  try {
    return JSON.parse(text);
  } catch {
    throw new Error(`Expected JSON from ${response.url || "remote"} but received: ${truncateBody(text, 120)}`);
  }
}

export async function assertStatus(
  response: Response,
  request: { method: string; url: string },
  accepted: (status: number) => boolean = (status) => status >= 200 && status < 300
): Promise<void> {
  if (accepted(response.status)) {
    return;
  }

  throw new HttpStatusError({
    method: request.method,
    url: request.url,
    status: response.status,
    body: await readBodyText(response)
  });
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}
