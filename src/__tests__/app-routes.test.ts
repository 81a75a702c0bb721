import assert from "node:assert/strict";
import { once } from "node:events";
import test from "node:test";
import { createApp } from "../app.js";
import { SessionStore } from "../workflow/session-store.js";
import { habitCode, launchFixture, LaunchFixtureOptions } from "./helpers/launch-fixture.js";

interface RunningApp {
  baseUrl: string;
  sessions: SessionStore;
  fixture: Awaited<ReturnType<typeof launchFixture>>;
  stop: () => Promise<void>;
}

async function startApp(options: LaunchFixtureOptions = {}): Promise<RunningApp> {
  const fixture = await launchFixture(options);
  const sessions = new SessionStore();
  const app = createApp({ workflow: fixture.workflow, sessions, corsAllowedOrigins: ["http://localhost:5173"] });
  const server = app.listen(0, "127.0.0.1");
  await once(server, "listening");
  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("Test server did not bind a TCP port.");
  }
  const port = address.port;

  return {
    baseUrl: `http://127.0.0.1:${port}`,
    sessions,
    fixture,
    stop: async () => {
      server.closeAllConnections();
      server.close();
      await once(server, "close");
    }
  };
}

function asRecord(value: unknown): Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new Error("Expected a JSON object.");
  }
  return Object.fromEntries(Object.entries(value));
}

async function call(baseUrl: string, method: string, pathname: string, body?: unknown) {
  const response = await fetch(`${baseUrl}${pathname}`, {
    method,
    headers: body === undefined ? {} : { "Content-Type": "application/json" },
    body: body === undefined ? undefined : JSON.stringify(body)
  });
  const payload: unknown = await response.json();
  return { status: response.status, headers: response.headers, body: asRecord(payload) };
}

const generationBody = { idea: "A habit tracker", repoName: "demo-app", pitchDeck: true };

test("health reports the session count", async (t) => {
  const running = await startApp();
  t.after(running.stop);

  const { status, headers, body } = await call(running.baseUrl, "GET", "/api/health");

  assert.equal(status, 200);
  assert.equal(body.ok, true);
  assert.equal(body.sessions, 0);
  assert.equal(headers.get("x-content-type-options"), "nosniff");
  assert.equal(headers.get("x-frame-options"), "DENY");
});

test("requests from an origin outside the allow list are forbidden", async (t) => {
  const running = await startApp();
  t.after(running.stop);

  const denied = await fetch(`${running.baseUrl}/api/health`, { headers: { Origin: "https://elsewhere.example.test" } });
  assert.equal(denied.status, 403);
  assert.deepEqual(await denied.json(), { error: "Origin not allowed by CORS." });

  const allowed = await fetch(`${running.baseUrl}/api/health`, { headers: { Origin: "http://localhost:5173" } });
  assert.equal(allowed.status, 200);
  assert.equal(allowed.headers.get("access-control-allow-origin"), "http://localhost:5173");
});

test("invalid generation payloads are rejected before any remote call", async (t) => {
  const running = await startApp();
  t.after(running.stop);

  const { status, body } = await call(running.baseUrl, "POST", "/api/generations", { idea: "   ", kind: "django" });

  assert.equal(status, 400);
  assert.equal(body.error, "Invalid request payload.");
  assert.equal(body.kind, "validation");
  assert.equal(running.fixture.remote.requests.length, 0);
});

test("unknown sessions are 404s", async (t) => {
  const running = await startApp();
  t.after(running.stop);

  assert.deepEqual(await call(running.baseUrl, "GET", "/api/sessions/missing").then((reply) => reply.body), {
    error: "Session not found."
  });
  assert.equal((await call(running.baseUrl, "POST", "/api/sessions/missing/deploy")).status, 404);
  assert.equal((await call(running.baseUrl, "POST", "/api/sessions/missing/materials")).status, 404);
});

test("generate then deploy through the API", async (t) => {
  const running = await startApp();
  t.after(running.stop);

  const generated = await call(running.baseUrl, "POST", "/api/generations", generationBody);
  assert.equal(generated.status, 201);
  assert.deepEqual(generated.body, {
    sessionId: "id-1",
    uniqueId: "id-2",
    code: habitCode,
    requirements: "streamlit\npandas",
    phase: "generated"
  });

  const view = await call(running.baseUrl, "GET", "/api/sessions/id-1");
  assert.equal(view.body.phase, "generated");
  assert.equal(view.body.terminal, false);
  assert.equal(view.body.kind, "streamlit");

  const deployed = await call(running.baseUrl, "POST", "/api/sessions/id-1/deploy");
  assert.equal(deployed.status, 200);
  assert.equal(deployed.body.phase, "deployed");
  assert.equal(deployed.body.terminal, true);
  assert.equal(deployed.body.repoName, "demo-app");
  assert.equal(deployed.body.repoUrl, "https://github.example.test/octo/demo-app");
  assert.equal(deployed.body.appName, "demo-app-0a1b2c3d");
  assert.equal(deployed.body.appUrl, "https://demo-app-0a1b2c3d.herokuapp.com");
  assert.equal(deployed.body.outcome, "deployed");
  assert.equal(deployed.body.error, null);
  assert.deepEqual(deployed.body.committedFiles, [
    "app.py",
    "requirements.txt",
    "Procfile",
    "setup.sh",
    "Dockerfile",
    "entrypoint.sh",
    "heroku.yml",
    ".github/workflows/deploy.yml"
  ]);

  const again = await call(running.baseUrl, "POST", "/api/sessions/id-1/deploy");
  assert.equal(again.status, 409);
  assert.equal(again.body.kind, "precondition");
  assert.equal(again.body.error, "Session is deployed; only a freshly generated session can be deployed.");
  assert.equal(asRecord(again.body.session).phase, "deployed");
});

test("a session with a step in flight refuses another", async (t) => {
  const running = await startApp();
  t.after(running.stop);

  await call(running.baseUrl, "POST", "/api/generations", generationBody);
  running.sessions.tryBegin("id-1");

  const blocked = await call(running.baseUrl, "POST", "/api/sessions/id-1/deploy");

  assert.equal(blocked.status, 409);
  assert.deepEqual(blocked.body, { error: "Another step is already running for this session.", kind: "precondition" });
});

test("remote failures map to 502 with the failed session", async (t) => {
  const running = await startApp({ reply: "No code today." });
  t.after(running.stop);

  const { status, body } = await call(running.baseUrl, "POST", "/api/generations", generationBody);

  assert.equal(status, 502);
  assert.equal(body.kind, "generation");
  assert.equal(body.error, "No ```python code block found in the model reply.");
  assert.equal(asRecord(body.session).phase, "failed");
  assert.equal(running.sessions.get("id-1")?.phase, "failed");
});

test("materials are requested and read back by identifier", async (t) => {
  const running = await startApp();
  t.after(running.stop);
  await call(running.baseUrl, "POST", "/api/generations", generationBody);

  const requested = await call(running.baseUrl, "POST", "/api/sessions/id-1/materials");
  assert.equal(requested.status, 202);
  assert.deepEqual(requested.body, { uniqueId: "id-2", requested: true });
  assert.equal(running.sessions.get("id-1")?.materialsRequested, true);

  running.fixture.pool.attachMaterials("id-2", { pitchDeckUrl: "https://slides.example.test/habit" });
  const links = await call(running.baseUrl, "GET", "/api/records/id-2/materials");
  assert.equal(links.status, 200);
  assert.deepEqual(links.body, {
    uniqueId: "id-2",
    pitchDeckUrl: "https://slides.example.test/habit",
    documentUrl: null
  });
});

test("a rejected material request keeps the session as it was", async (t) => {
  const running = await startApp();
  t.after(running.stop);
  running.fixture.remote.on("POST", /^\/hooks\/materials$/, { status: 500, body: "automation offline" });
  await call(running.baseUrl, "POST", "/api/generations", generationBody);

  const { status, body } = await call(running.baseUrl, "POST", "/api/sessions/id-1/materials");

  assert.equal(status, 502);
  assert.equal(body.kind, "auxiliary");
  assert.equal(body.error, "Material webhook rejected the request (500): automation offline");
  assert.equal(asRecord(body.session).phase, "generated");
  assert.equal(running.sessions.get("id-1")?.phase, "generated");
});
