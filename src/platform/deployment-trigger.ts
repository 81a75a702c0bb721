import { GitHubClient } from "../github/github-client.js";
import { PublishFile, RepositoryPublisher } from "../github/repository-publisher.js";
import { PlatformError } from "../lib/errors.js";
import { sleep as defaultSleep } from "../lib/http-client.js";
import { logDebug, logInfo, logWarn } from "../lib/logging.js";
import { shortHexId } from "../lib/strings.js";
import { renderDeployWorkflow, WORKFLOW_FILE_NAME, WORKFLOW_PATH } from "../templates/catalog.js";
import { CiTriggerStrategy, CommittedFile, DeploymentOutcome, PlatformApplication, RemoteRepository } from "../types.js";
import { defaultAppUrl, deriveAppName } from "./app-name.js";
import { HerokuClient } from "./heroku-client.js";

/** Heroku writes this release when an app is created, before any build. */
const INITIAL_RELEASE_DESCRIPTION = "Initial release";

export interface DeploymentTriggerOptions {
  ciTrigger: CiTriggerStrategy;
  pollIntervalMs: number;
  pollTimeoutMs: number;
  dispatchAttempts?: number;
  dispatchRetryDelayMs?: number;
  suffix?: () => string;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export class DeploymentTrigger {
  private readonly heroku: HerokuClient;
  private readonly github: GitHubClient;
  private readonly publisher: RepositoryPublisher;
  private readonly options: Required<DeploymentTriggerOptions>;

  constructor(
    deps: { heroku: HerokuClient; github: GitHubClient; publisher: RepositoryPublisher },
    options: DeploymentTriggerOptions
  ) {
    this.heroku = deps.heroku;
    this.github = deps.github;
    this.publisher = deps.publisher;
    this.options = {
      dispatchAttempts: 5,
      dispatchRetryDelayMs: 3_000,
      suffix: shortHexId,
      sleep: defaultSleep,
      now: Date.now,
      ...options
    };
  }

  async createApplication(repoName: string): Promise<PlatformApplication> {
    const name = deriveAppName(repoName, this.options.suffix());
    const created = await this.heroku.createApp(name);

    logInfo("platform.app_created", { appName: created.name });
    return { name: created.name, url: (created.webUrl || defaultAppUrl(created.name)).replace(/\/$/, "") };
  }

  async commitWorkflow(repo: RemoteRepository, application: PlatformApplication): Promise<CommittedFile> {
    return this.publisher.upsertFile(
      repo,
      { path: WORKFLOW_PATH, content: renderDeployWorkflow(application.name, repo.defaultBranch) },
      "add deploy workflow"
    );
  }

  /**
   * Starts the CI run. `dispatch` asks GitHub to run the workflow directly,
   * retrying while the freshly committed file is indexed; `recommit` writes
   * every tracked file again so the push event starts it.
   */
  async triggerBuild(repo: RemoteRepository, files: PublishFile[]): Promise<void> {
    if (this.options.ciTrigger === "recommit") {
      for (const file of files) {
        await this.publisher.upsertFile(repo, file, "deploy to Heroku");
      }
      logInfo("platform.build_triggered", { repo: repo.fullName, strategy: "recommit", files: files.length });
      return;
    }

    let lastStatus = 0;
    for (let attempt = 1; attempt <= this.options.dispatchAttempts; attempt += 1) {
      lastStatus = await this.github.dispatchWorkflow(repo, WORKFLOW_FILE_NAME, repo.defaultBranch);
      if (lastStatus === 204) {
        logInfo("platform.build_triggered", { repo: repo.fullName, strategy: "dispatch", attempt });
        return;
      }

      logWarn("platform.dispatch_not_ready", { repo: repo.fullName, attempt, status: lastStatus });
      if (attempt < this.options.dispatchAttempts) {
        await this.options.sleep(this.options.dispatchRetryDelayMs);
      }
    }

    throw new PlatformError(`Workflow dispatch was not accepted after ${this.options.dispatchAttempts} attempts.`, {
      repo: repo.fullName,
      status: lastStatus
    });
  }

  async latestReleaseVersion(application: PlatformApplication): Promise<number | null> {
    const release = await this.heroku.latestRelease(application.name);
    return release?.version ?? null;
  }

  /**
   * Polls releases until one newer than `baselineVersion` settles. Without a
   * baseline, the app's initial release never counts. A failed release is an
   * error; running out of time reports the deployment as unconfirmed.
   */
  async awaitRelease(application: PlatformApplication, baselineVersion: number | null): Promise<DeploymentOutcome> {
    const deadline = this.options.now() + this.options.pollTimeoutMs;

    for (;;) {
      const release = await this.heroku.latestRelease(application.name);
      const isNew =
        release !== null &&
        (baselineVersion === null
          ? release.description !== INITIAL_RELEASE_DESCRIPTION
          : release.version > baselineVersion);
      logDebug("platform.release_polled", {
        appName: application.name,
        version: release?.version ?? null,
        status: release?.status ?? null,
        isNew
      });

      if (release && isNew && release.status === "succeeded") {
        logInfo("platform.release_succeeded", { appName: application.name, version: release.version });
        return { application, outcome: "deployed", releaseVersion: release.version };
      }

      if (release && isNew && release.status === "failed") {
        throw new PlatformError(`Release v${release.version} of ${application.name} failed.`, {
          appName: application.name,
          version: release.version,
          description: release.description ?? null
        });
      }

      if (this.options.now() >= deadline) {
        logWarn("platform.release_unconfirmed", { appName: application.name, timeoutMs: this.options.pollTimeoutMs });
        return { application, outcome: "unconfirmed", releaseVersion: null };
      }

      await this.options.sleep(this.options.pollIntervalMs);
    }
  }
}
