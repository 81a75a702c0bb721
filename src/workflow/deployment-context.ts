import { PreconditionError, WorkflowError } from "../lib/errors.js";
import { DeploymentContext, GenerationRequest, LaunchPhase } from "../types.js";
import { isAllowedStateTransition, launchPhaseGraph } from "./lifecycle-graph.js";

type ContextPatch = Partial<Omit<DeploymentContext, "sessionId" | "phase" | "request" | "updatedAt">>;

export function createContext(sessionId: string, request: GenerationRequest, now = new Date()): DeploymentContext {
  return Object.freeze({
    sessionId,
    phase: launchPhaseGraph.initialState,
    request: Object.freeze({ ...request }),
    uniqueId: null,
    artifact: null,
    repository: null,
    committedFiles: [],
    deployment: null,
    materialsRequested: false,
    error: null,
    updatedAt: now.toISOString()
  });
}

/** Returns a copy of `context` with `patch` applied, without changing phase. */
export function withContext(context: DeploymentContext, patch: ContextPatch, now = new Date()): DeploymentContext {
  return Object.freeze({ ...context, ...patch, updatedAt: now.toISOString() });
}

export function advance(
  context: DeploymentContext,
  phase: LaunchPhase,
  patch: ContextPatch = {},
  now = new Date()
): DeploymentContext {
  if (!isAllowedStateTransition(launchPhaseGraph, context.phase, phase)) {
    throw new PreconditionError(`Cannot move from ${context.phase} to ${phase}.`, {
      sessionId: context.sessionId,
      from: context.phase,
      to: phase
    });
  }

  return Object.freeze({ ...context, ...patch, phase, updatedAt: now.toISOString() });
}

export function failContext(context: DeploymentContext, error: WorkflowError, patch: ContextPatch = {}): DeploymentContext {
  return advance(context, "failed", { ...patch, error: { kind: error.kind, message: error.message } });
}
