import cors from "cors";
import express from "express";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { ZodError, z } from "zod";
import { isWorkflowError, PreconditionError, WorkflowError, WorkflowErrorKind } from "./lib/errors.js";
import { logError, logInfo, serializeError } from "./lib/logging.js";
import { DeploymentContext } from "./types.js";
import { LaunchResult, LaunchWorkflow } from "./workflow/launch-workflow.js";
import { isTerminalState, launchPhaseGraph } from "./workflow/lifecycle-graph.js";
import { SessionStore } from "./workflow/session-store.js";

const generationSchema = z.object({
  idea: z.string().trim().min(1, "Describe the app idea.").max(4000),
  kind: z.enum(["streamlit", "gradio", "flask"]).default("streamlit"),
  repoName: z.string().trim().max(100).optional(),
  pitchDeck: z.boolean().default(false),
  document: z.boolean().default(false)
});

const sessionParamsSchema = z.object({
  sessionId: z.string().trim().min(1).max(128)
});

const recordParamsSchema = z.object({
  uniqueId: z.string().trim().min(1).max(128)
});

class HttpError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.status = status;
  }
}

const statusByKind: Record<WorkflowErrorKind, number> = {
  precondition: 409,
  generation: 502,
  publish: 502,
  secret: 502,
  platform: 502,
  ledger: 502,
  auxiliary: 502
};

export interface AppDependencies {
  workflow: LaunchWorkflow;
  sessions: SessionStore;
  corsAllowedOrigins: string[];
  publicDir?: string;
}

export function toSessionView(context: DeploymentContext) {
  return {
    sessionId: context.sessionId,
    phase: context.phase,
    terminal: isTerminalState(launchPhaseGraph, context.phase),
    uniqueId: context.uniqueId,
    kind: context.request.kind,
    repoName: context.repository?.name ?? null,
    repoUrl: context.repository?.htmlUrl ?? null,
    appName: context.deployment?.application.name ?? null,
    appUrl: context.deployment?.application.url ?? null,
    outcome: context.deployment?.outcome ?? null,
    committedFiles: context.committedFiles.map((file) => file.path),
    materialsRequested: context.materialsRequested,
    error: context.error,
    updatedAt: context.updatedAt
  };
}

function sendWorkflowError(res: express.Response, error: WorkflowError, context?: DeploymentContext) {
  return res.status(statusByKind[error.kind]).json({
    error: error.message,
    kind: error.kind,
    ...(context ? { session: toSessionView(context) } : {})
  });
}

function defaultPublicDir(): string {
  return path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "public");
}

export function createApp(deps: AppDependencies): express.Express {
  const { workflow, sessions } = deps;
  const app = express();

  app.use(
    cors({
      origin(origin, callback) {
        if (!origin) {
          callback(null, true);
          return;
        }

        if (deps.corsAllowedOrigins.includes(origin)) {
          callback(null, true);
          return;
        }

        callback(new HttpError(403, "Origin not allowed by CORS."));
      }
    })
  );

  app.use(express.json({ limit: "1mb" }));

  app.use((_req, res, next) => {
    res.setHeader("X-Content-Type-Options", "nosniff");
    res.setHeader("X-Frame-Options", "DENY");
    res.setHeader("Referrer-Policy", "no-referrer");
    next();
  });

  app.use(express.static(deps.publicDir ?? defaultPublicDir()));

  const requireSession = (sessionId: string): DeploymentContext => {
    const context = sessions.get(sessionId);
    if (!context) {
      throw new HttpError(404, "Session not found.");
    }
    return context;
  };

  /** Runs one step for a session while holding its busy flag. */
  const runExclusive = async (
    sessionId: string,
    step: (context: DeploymentContext) => Promise<LaunchResult>
  ): Promise<LaunchResult> => {
    const context = requireSession(sessionId);
    if (!sessions.tryBegin(sessionId)) {
      throw new PreconditionError("Another step is already running for this session.", { sessionId });
    }

    try {
      const result = await step(context);
      sessions.save(result.context);
      return result;
    } finally {
      sessions.end(sessionId);
    }
  };

  app.get("/api/health", (_req, res) => {
    res.json({
      ok: true,
      sessions: sessions.size,
      now: new Date().toISOString()
    });
  });

  app.post("/api/generations", async (req, res, next) => {
    try {
      const parsed = generationSchema.parse(req.body ?? {});
      const result = await workflow.generate(parsed, (context) => {
        sessions.save(context);
      });
      sessions.save(result.context);

      if (!result.ok) {
        sendWorkflowError(res, result.error, result.context);
        return;
      }

      const artifact = result.context.artifact;
      res.status(201).json({
        sessionId: result.context.sessionId,
        uniqueId: result.context.uniqueId,
        code: artifact?.code ?? "",
        requirements: artifact?.requirements ?? "",
        phase: result.context.phase
      });
    } catch (error) {
      next(error);
    }
  });

  app.get("/api/sessions/:sessionId", (req, res, next) => {
    try {
      const { sessionId } = sessionParamsSchema.parse(req.params);
      res.json(toSessionView(requireSession(sessionId)));
    } catch (error) {
      next(error);
    }
  });

  app.post("/api/sessions/:sessionId/deploy", async (req, res, next) => {
    try {
      const { sessionId } = sessionParamsSchema.parse(req.params);
      const result = await runExclusive(sessionId, (context) =>
        workflow.deploy(context, (progress) => {
          sessions.save(progress);
        })
      );

      if (!result.ok) {
        sendWorkflowError(res, result.error, result.context);
        return;
      }

      logInfo("http.deploy.completed", { sessionId, phase: result.context.phase });
      res.json(toSessionView(result.context));
    } catch (error) {
      next(error);
    }
  });

  app.post("/api/sessions/:sessionId/materials", async (req, res, next) => {
    try {
      const { sessionId } = sessionParamsSchema.parse(req.params);
      const result = await runExclusive(sessionId, (context) => workflow.requestMaterials(context));

      if (!result.ok) {
        sendWorkflowError(res, result.error, result.context);
        return;
      }

      res.status(202).json({
        uniqueId: result.context.uniqueId,
        requested: result.context.materialsRequested
      });
    } catch (error) {
      next(error);
    }
  });

  app.get("/api/records/:uniqueId/materials", async (req, res, next) => {
    try {
      const { uniqueId } = recordParamsSchema.parse(req.params);
      const result = await workflow.readMaterials(uniqueId);

      if (!result.ok) {
        sendWorkflowError(res, result.error);
        return;
      }

      res.json(result.value);
    } catch (error) {
      next(error);
    }
  });

  app.use((error: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (error instanceof ZodError) {
      logError("http.error.validation", {
        details: error.issues.map((issue) => issue.message)
      });

      return res.status(400).json({
        error: "Invalid request payload.",
        kind: "validation",
        details: error.issues.map((issue) => issue.message)
      });
    }

    if (error instanceof HttpError) {
      logError("http.error", { statusCode: error.status, ...serializeError(error) });
      return res.status(error.status).json({ error: error.message });
    }

    if (isWorkflowError(error)) {
      logError("http.error.workflow", serializeError(error));
      return sendWorkflowError(res, error);
    }

    logError("http.error.unhandled", serializeError(error));
    return res.status(500).json({ error: "Internal server error." });
  });

  return app;
}
