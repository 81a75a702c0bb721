import type { FetchLike } from "../../lib/http-client.js";

export interface RecordedRequest {
  method: string;
  url: string;
  path: string;
  headers: Record<string, string>;
  rawBody: string;
  body: unknown;
}

export interface FakeResponse {
  status?: number;
  body?: unknown;
  headers?: Record<string, string>;
}

type Responder = (request: RecordedRequest, match: RegExpExecArray) => FakeResponse | Promise<FakeResponse>;

interface Route {
  method: string;
  pattern: RegExp;
  respond: Responder;
  times: number;
}

function parseBody(raw: string): unknown {
  if (!raw) {
    return undefined;
  }
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

/**
 * In-process stand-in for the remote HTTP APIs. Routes match on method and
 * on path plus query string; the most recently added matching route wins,
 * so a test can override a default answer for one call with `once`.
 */
export class FakeRemote {
  readonly requests: RecordedRequest[] = [];
  private readonly routes: Route[] = [];

  on(method: string, pattern: RegExp, respond: Responder | FakeResponse): this {
    this.routes.push({
      method,
      pattern,
      respond: typeof respond === "function" ? respond : () => respond,
      times: Number.POSITIVE_INFINITY
    });
    return this;
  }

  once(method: string, pattern: RegExp, respond: Responder | FakeResponse): this {
    this.routes.push({
      method,
      pattern,
      respond: typeof respond === "function" ? respond : () => respond,
      times: 1
    });
    return this;
  }

  calls(method: string, pattern: RegExp): RecordedRequest[] {
    return this.requests.filter((request) => request.method === method && pattern.test(request.path));
  }

  readonly fetch: FetchLike = async (input, init) => {
    const url = new URL(input);
    const method = (init?.method ?? "GET").toUpperCase();
    const rawBody = typeof init?.body === "string" ? init.body : "";
    const request: RecordedRequest = {
      method,
      url: input,
      path: `${url.pathname}${url.search}`,
      headers: Object.fromEntries(new Headers(init?.headers).entries()),
      rawBody,
      body: parseBody(rawBody)
    };
    this.requests.push(request);

    for (let index = this.routes.length - 1; index >= 0; index -= 1) {
      const route = this.routes[index];
      if (!route || route.times <= 0 || route.method !== method) {
        continue;
      }
      const match = route.pattern.exec(request.path);
      if (!match) {
        continue;
      }

      route.times -= 1;
      const answer = await route.respond(request, match);
      const status = answer.status ?? 200;
      const noBody = status === 204 || status === 205 || status === 304 || answer.body === undefined;
      const payload = typeof answer.body === "string" ? answer.body : JSON.stringify(answer.body);

      return new Response(noBody ? null : payload, {
        status,
        headers: { "content-type": "application/json", ...answer.headers }
      });
    }

    throw new Error(`No fake route for ${method} ${request.path}`);
  };
}

export function jsonBody(request: RecordedRequest): Record<string, unknown> {
  const body = request.body;
  if (!body || typeof body !== "object" || Array.isArray(body)) {
    throw new Error(`Expected a JSON object body for ${request.method} ${request.path}`);
  }
  return Object.fromEntries(Object.entries(body));
}
