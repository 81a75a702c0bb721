import { MaterialTrigger } from "./auxiliary/material-trigger.js";
import { OpenAIChatClient } from "./composer/providers.js";
import { GitHubClient } from "./github/github-client.js";
import { RepositoryPublisher } from "./github/repository-publisher.js";
import { SecretProvisioner } from "./github/secret-provisioner.js";
import { createLedger } from "./ledger/index.js";
import { DeploymentLedger } from "./ledger/types.js";
import { AppConfig } from "./lib/config.js";
import { FetchLike } from "./lib/http-client.js";
import { DeploymentTrigger } from "./platform/deployment-trigger.js";
import { HerokuClient } from "./platform/heroku-client.js";
import { LaunchWorkflow } from "./workflow/launch-workflow.js";

export interface Runtime {
  workflow: LaunchWorkflow;
  ledger: DeploymentLedger;
}

/** Wires every remote client from validated configuration. Shared by the server and the CLI. */
export function createRuntime(config: AppConfig, options: { fetchImpl?: FetchLike } = {}): Runtime {
  const { fetchImpl } = options;
  const github = new GitHubClient({ token: config.github.token, apiUrl: config.github.apiUrl, fetchImpl });
  const heroku = new HerokuClient({ apiKey: config.heroku.apiKey, apiUrl: config.heroku.apiUrl, fetchImpl });
  const publisher = new RepositoryPublisher(github);
  const ledger = createLedger(config.ledger, fetchImpl);

  const workflow = new LaunchWorkflow({
    completion: new OpenAIChatClient({
      apiKey: config.openai.apiKey,
      model: config.openai.model,
      baseUrl: config.openai.baseUrl,
      fetchImpl
    }),
    publisher,
    secrets: new SecretProvisioner(github),
    deployer: new DeploymentTrigger(
      { heroku, github, publisher },
      {
        ciTrigger: config.ciTrigger,
        pollIntervalMs: config.deployPoll.intervalMs,
        pollTimeoutMs: config.deployPoll.timeoutMs
      }
    ),
    ledger,
    materials: new MaterialTrigger({ webhookUrl: config.webhookUrl, ledger, fetchImpl }),
    platformApiKey: config.heroku.apiKey,
    defaultRepoName: config.defaultRepoName,
    unmappedImportPolicy: config.unmappedImportPolicy
  });

  return { workflow, ledger };
}
