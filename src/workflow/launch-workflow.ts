import { randomUUID } from "node:crypto";
import { MaterialTrigger } from "../auxiliary/material-trigger.js";
import { generateCode } from "../composer/prompt-composer.js";
import { ChatCompletionClient } from "../composer/providers.js";
import { RepositoryPublisher } from "../github/repository-publisher.js";
import { SecretProvisioner } from "../github/secret-provisioner.js";
import { DeploymentLedger, LEDGER_IN_PROGRESS } from "../ledger/types.js";
import {
  AuxiliaryError,
  capture,
  GenerationError,
  LedgerError,
  PlatformError,
  PreconditionError,
  PublishError,
  SecretError,
  StepResult,
  WorkflowError
} from "../lib/errors.js";
import { logError, logInfo } from "../lib/logging.js";
import { toDescription } from "../lib/strings.js";
import { inferRequirements } from "../manifest/dependency-inferrer.js";
import { DeploymentTrigger } from "../platform/deployment-trigger.js";
import { PLATFORM_SECRET_NAME, renderArtifactFiles } from "../templates/catalog.js";
import { DeploymentContext, GenerationRequest, MaterialLinks, UnmappedImportPolicy } from "../types.js";
import { advance, createContext, failContext, withContext } from "./deployment-context.js";

export type LaunchResult =
  | { ok: true; context: DeploymentContext }
  | { ok: false; context: DeploymentContext; error: WorkflowError };

export interface LaunchWorkflowDeps {
  completion: ChatCompletionClient;
  publisher: RepositoryPublisher;
  secrets: SecretProvisioner;
  deployer: DeploymentTrigger;
  ledger: DeploymentLedger;
  materials: MaterialTrigger;
  platformApiKey: string;
  defaultRepoName: string;
  unmappedImportPolicy: UnmappedImportPolicy;
  newId?: () => string;
}

type ProgressListener = (context: DeploymentContext) => void;

const asGeneration = (message: string, cause: unknown) => new GenerationError(message, undefined, { cause });
const asLedger = (message: string, cause: unknown) => new LedgerError(message, undefined, { cause });
const asPublish = (message: string, cause: unknown) => new PublishError(message, undefined, { cause });
const asSecret = (message: string, cause: unknown) => new SecretError(message, undefined, { cause });
const asPlatform = (message: string, cause: unknown) => new PlatformError(message, undefined, { cause });

/**
 * Runs the launch sequence one phase at a time. Each phase returns a new
 * context; a failure stops the sequence and leaves earlier remote changes
 * where they are.
 */
export class LaunchWorkflow {
  private readonly deps: LaunchWorkflowDeps;
  private readonly newId: () => string;

  constructor(deps: LaunchWorkflowDeps) {
    this.deps = deps;
    this.newId = deps.newId ?? randomUUID;
  }

  private failed(context: DeploymentContext, error: WorkflowError, onProgress?: ProgressListener): LaunchResult {
    const next = failContext(context, error);
    logError(`workflow.${error.kind}.failed`, {
      sessionId: context.sessionId,
      uniqueId: context.uniqueId,
      phase: context.phase,
      message: error.message,
      details: error.details
    });
    onProgress?.(next);
    return { ok: false, context: next, error };
  }

  async generate(request: GenerationRequest, onProgress?: ProgressListener): Promise<LaunchResult> {
    let context = advance(createContext(this.newId(), request), "generating");
    onProgress?.(context);
    logInfo("workflow.generate.started", { sessionId: context.sessionId, kind: request.kind });

    const composed = await capture(() => generateCode(this.deps.completion, request), asGeneration);
    if (!composed.ok) {
      return this.failed(context, composed.error, onProgress);
    }

    const inferred = await capture(
      async () => inferRequirements(composed.value.code, request.kind, { policy: this.deps.unmappedImportPolicy }),
      asGeneration
    );
    if (!inferred.ok) {
      return this.failed(context, inferred.error, onProgress);
    }
    const requirements = inferred.value;
    const artifact = { code: composed.value.code, requirements };
    const uniqueId = this.newId();
    context = withContext(context, { artifact });

    const inserted = await capture(
      () =>
        this.deps.ledger.insert({
          uniqueId,
          prompt: request.idea,
          repoName: request.repoName || this.deps.defaultRepoName,
          status: LEDGER_IN_PROGRESS,
          pitchDeck: request.pitchDeck,
          document: request.document,
          pitchDeckUrl: null,
          documentUrl: null,
          appUrl: null,
          createdTime: new Date().toISOString()
        }),
      asLedger
    );
    if (!inserted.ok) {
      return this.failed(context, inserted.error, onProgress);
    }

    context = advance(context, "generated", { uniqueId });
    onProgress?.(context);
    logInfo("workflow.generate.completed", {
      sessionId: context.sessionId,
      uniqueId,
      codeBytes: artifact.code.length,
      packages: requirements.split("\n")
    });
    return { ok: true, context };
  }

  private checkDeployable(context: DeploymentContext): StepResult<{ uniqueId: string; code: string; requirements: string }> {
    if (!context.artifact || !context.uniqueId) {
      return {
        ok: false,
        error: new PreconditionError("No generated code to deploy. Generate the app first.", {
          sessionId: context.sessionId
        })
      };
    }

    if (context.phase !== "generated") {
      return {
        ok: false,
        error: new PreconditionError(`Session is ${context.phase}; only a freshly generated session can be deployed.`, {
          sessionId: context.sessionId,
          phase: context.phase
        })
      };
    }

    return { ok: true, value: { uniqueId: context.uniqueId, ...context.artifact } };
  }

  async deploy(initial: DeploymentContext, onProgress?: ProgressListener): Promise<LaunchResult> {
    const ready = this.checkDeployable(initial);
    if (!ready.ok) {
      return { ok: false, context: initial, error: ready.error };
    }

    const { uniqueId } = ready.value;
    const request = initial.request;
    const files = renderArtifactFiles(request.kind, ready.value);

    let context = advance(initial, "publishing");
    onProgress?.(context);

    const repository = await capture(
      () => this.deps.publisher.createRepository(request.repoName || this.deps.defaultRepoName, toDescription(request.idea)),
      asPublish
    );
    if (!repository.ok) {
      return this.failed(context, repository.error, onProgress);
    }
    const repo = repository.value;
    context = withContext(context, { repository: repo });
    onProgress?.(context);

    const committed = await capture(() => this.deps.publisher.publishFiles(repo, files), asPublish);
    if (!committed.ok) {
      return this.failed(context, committed.error, onProgress);
    }

    context = advance(context, "secret-provisioning", { committedFiles: committed.value });
    onProgress?.(context);

    const secret = await capture(
      () => this.deps.secrets.provision(repo, PLATFORM_SECRET_NAME, this.deps.platformApiKey),
      asSecret
    );
    if (!secret.ok) {
      return this.failed(context, secret.error, onProgress);
    }

    context = advance(context, "deploying");
    onProgress?.(context);

    const deployed = await capture(async () => {
      const application = await this.deps.deployer.createApplication(repo.name);
      const baseline = await this.deps.deployer.latestReleaseVersion(application);
      const workflowFile = await this.deps.deployer.commitWorkflow(repo, application);
      await this.deps.deployer.triggerBuild(repo, files);
      const outcome = await this.deps.deployer.awaitRelease(application, baseline);
      return { outcome, workflowFile };
    }, asPlatform);
    if (!deployed.ok) {
      return this.failed(context, deployed.error, onProgress);
    }

    const { outcome, workflowFile } = deployed.value;
    context = withContext(context, {
      deployment: outcome,
      committedFiles: [...context.committedFiles, workflowFile]
    });

    const recorded = await capture(
      () => this.deps.ledger.markDone(uniqueId, { repoName: repo.name, appUrl: outcome.application.url }),
      asLedger
    );
    if (!recorded.ok) {
      return this.failed(context, recorded.error, onProgress);
    }

    context = advance(context, "deployed");
    onProgress?.(context);
    logInfo("workflow.deploy.completed", {
      sessionId: context.sessionId,
      uniqueId,
      repo: repo.fullName,
      appName: outcome.application.name,
      url: outcome.application.url,
      outcome: outcome.outcome
    });
    return { ok: true, context };
  }

  /** Never changes the deployment phase or the ledger status, whatever the webhook answers. */
  async requestMaterials(context: DeploymentContext): Promise<LaunchResult> {
    if (!context.uniqueId) {
      return {
        ok: false,
        context,
        error: new PreconditionError("No identifier for this session. Generate the app first.", {
          sessionId: context.sessionId
        })
      };
    }

    const uniqueId = context.uniqueId;
    const triggered = await capture(
      () =>
        this.deps.materials.trigger({
          uniqueId,
          prompt: context.request.idea,
          pitchDeck: context.request.pitchDeck,
          document: context.request.document
        }),
      (message, cause) => new AuxiliaryError(message, undefined, { cause })
    );

    if (!triggered.ok) {
      logError(`workflow.${triggered.error.kind}.failed`, {
        sessionId: context.sessionId,
        uniqueId,
        message: triggered.error.message
      });
      return { ok: false, context, error: triggered.error };
    }

    return { ok: true, context: withContext(context, { materialsRequested: triggered.value }) };
  }

  async readMaterials(uniqueId: string): Promise<StepResult<MaterialLinks>> {
    return capture(() => this.deps.materials.readLinks(uniqueId), asLedger);
  }
}
