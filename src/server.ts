import "dotenv/config";
import type { Server as HttpServer } from "node:http";
import { createApp } from "./app.js";
import { AppConfig, loadConfig } from "./lib/config.js";
import { ConfigError } from "./lib/errors.js";
import { logError, logInfo, serializeError } from "./lib/logging.js";
import { createRuntime } from "./runtime.js";
import { SessionStore } from "./workflow/session-store.js";

const shutdownGraceMs = Number(process.env.SHUTDOWN_GRACE_MS || 10_000);

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logError("server.config_invalid", { issues: error.issues });
      process.exit(1);
    }
    throw error;
  }
}

const config = readConfig();
const runtime = createRuntime(config);
const app = createApp({
  workflow: runtime.workflow,
  sessions: new SessionStore(config.sessions),
  corsAllowedOrigins: config.corsAllowedOrigins
});

let httpServer: HttpServer | null = null;
let ledgerClosed = false;
let shutdownPromise: Promise<void> | null = null;

async function main(): Promise<void> {
  await runtime.ledger.initialize();

  httpServer = await new Promise<HttpServer>((resolve, reject) => {
    const server = app.listen(config.port, () => resolve(server));
    server.once("error", reject);
  });

  logInfo("server.started", {
    port: config.port,
    origins: config.corsAllowedOrigins,
    ledger: runtime.ledger.driver,
    ciTrigger: config.ciTrigger
  });
  console.log(`idea2deploy running at http://localhost:${config.port}`);
}

function closeHttpServer(server: HttpServer): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }

      resolve();
    });
  });
}

async function closeLedgerOnce(): Promise<void> {
  if (ledgerClosed) {
    return;
  }

  await runtime.ledger.close();
  ledgerClosed = true;
}

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  if (shutdownPromise) {
    await shutdownPromise;
    return;
  }

  shutdownPromise = (async () => {
    const startedAt = Date.now();
    logInfo("server.shutdown_started", { signal, graceMs: shutdownGraceMs });

    const forceExitTimer = setTimeout(() => {
      logError("server.shutdown_timeout", { signal, graceMs: shutdownGraceMs });
      process.exit(1);
    }, shutdownGraceMs);

    forceExitTimer.unref();

    try {
      if (httpServer) {
        httpServer.closeIdleConnections();
        await closeHttpServer(httpServer);
      }

      await closeLedgerOnce();

      logInfo("server.shutdown_complete", { signal, durationMs: Date.now() - startedAt });
      process.exit(0);
    } catch (error) {
      logError("server.shutdown_failed", {
        signal,
        durationMs: Date.now() - startedAt,
        ...serializeError(error)
      });
      process.exit(1);
    } finally {
      clearTimeout(forceExitTimer);
    }
  })();

  await shutdownPromise;
}

process.once("SIGTERM", () => {
  void shutdown("SIGTERM");
});

process.once("SIGINT", () => {
  void shutdown("SIGINT");
});

main().catch(async (error) => {
  logError("server.start_failed", {
    ...serializeError(error)
  });

  try {
    await closeLedgerOnce();
  } catch (closeError) {
    logError("server.start_failed_cleanup", {
      ...serializeError(closeError)
    });
  }

  process.exit(1);
});
