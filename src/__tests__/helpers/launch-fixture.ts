import sodium from "libsodium-wrappers";
import { MaterialTrigger } from "../../auxiliary/material-trigger.js";
import { OpenAIChatClient } from "../../composer/providers.js";
import { GitHubClient } from "../../github/github-client.js";
import { RepositoryPublisher } from "../../github/repository-publisher.js";
import { SecretProvisioner } from "../../github/secret-provisioner.js";
import { PostgresLedger } from "../../ledger/postgres-ledger.js";
import { DeploymentTrigger } from "../../platform/deployment-trigger.js";
import { HerokuClient } from "../../platform/heroku-client.js";
import { GenerationRequest } from "../../types.js";
import { LaunchWorkflow } from "../../workflow/launch-workflow.js";
import { FakeRemote, FakeResponse, jsonBody } from "./fake-remote.js";
import { InMemoryQueryable } from "./fake-postgres.js";

export const habitCode = 'import streamlit as st\nimport pandas as pd\n\nst.title("Habits")';

export const habitReply = `Here is the app:\n\n\`\`\`python\n${habitCode}\n\`\`\`\n`;

export const habitRequest: GenerationRequest = {
  idea: "A habit tracker",
  kind: "streamlit",
  repoName: "demo-app",
  pitchDeck: true,
  document: false
};

export interface LaunchFixtureOptions {
  reply?: string;
  existingRepos?: string[];
  releases?: FakeResponse[];
  pollTimeoutMs?: number;
}

/**
 * A workflow wired to real clients over one in-process remote. Repository
 * suffixes are always 9f8e7d6c and app suffixes 0a1b2c3d; identifiers come
 * out as id-1, id-2 and so on.
 */
export async function launchFixture(options: LaunchFixtureOptions = {}) {
  await sodium.ready;
  const keyPair = sodium.crypto_box_keypair();
  const remote = new FakeRemote();
  const pool = new InMemoryQueryable();
  const ledger = new PostgresLedger({ pool });
  const clock: { now: number; sleeps: number[] } = { now: 0, sleeps: [] };
  const releases = [...(options.releases ?? [{ body: [] }, { body: [{ version: 1, status: "succeeded" }] }])];
  let issued = 0;

  remote
    .on("POST", /^\/v1\/chat\/completions$/, {
      body: { choices: [{ message: { role: "assistant", content: options.reply ?? habitReply } }] }
    })
    .on("GET", /^\/user\/repos\?/, { body: (options.existingRepos ?? []).map((name) => ({ name })) })
    .on("POST", /^\/user\/repos$/, (request) => {
      const name = String(jsonBody(request).name);
      return {
        status: 201,
        body: {
          name,
          full_name: `octo/${name}`,
          html_url: `https://github.example.test/octo/${name}`,
          default_branch: "main",
          owner: { login: "octo" }
        }
      };
    })
    .on("GET", /^\/repos\/octo\/[^/]+\/contents\//, { status: 404, body: { message: "Not Found" } })
    .on("PUT", /^\/repos\/octo\/[^/]+\/contents\/(.+)$/, (_request, match) => ({
      status: 201,
      body: { content: { sha: `sha-${decodeURIComponent(match[1] ?? "")}` } }
    }))
    .on("GET", /^\/repos\/octo\/[^/]+\/actions\/secrets\/public-key$/, {
      body: { key_id: "key-1", key: sodium.to_base64(keyPair.publicKey, sodium.base64_variants.ORIGINAL) }
    })
    .on("PUT", /^\/repos\/octo\/[^/]+\/actions\/secrets\/HEROKU_API_KEY$/, { status: 201 })
    .on("POST", /^\/repos\/octo\/[^/]+\/actions\/workflows\/deploy\.yml\/dispatches$/, { status: 204 })
    .on("POST", /^\/apps$/, (request) => ({ status: 201, body: { name: jsonBody(request).name, web_url: null } }))
    .on("GET", /^\/apps\/[^/]+\/releases$/, () => (releases.length > 1 ? releases.shift() : releases[0]) ?? { body: [] })
    .on("POST", /^\/hooks\/materials$/, { status: 200, body: "Accepted" });

  const github = new GitHubClient({ token: "test-github-token", apiUrl: "https://github.example.test", fetchImpl: remote.fetch });
  const heroku = new HerokuClient({ apiKey: "test-heroku-key", apiUrl: "https://heroku.example.test", fetchImpl: remote.fetch });
  const publisher = new RepositoryPublisher(github, { suffix: () => "9f8e7d6c" });

  const workflow = new LaunchWorkflow({
    completion: new OpenAIChatClient({
      apiKey: "test-openai-key",
      model: "gpt-test",
      baseUrl: "https://llm.example.test/v1",
      fetchImpl: remote.fetch
    }),
    publisher,
    secrets: new SecretProvisioner(github),
    deployer: new DeploymentTrigger(
      { heroku, github, publisher },
      {
        ciTrigger: "dispatch",
        pollIntervalMs: 1_000,
        pollTimeoutMs: options.pollTimeoutMs ?? 5_000,
        suffix: () => "0a1b2c3d",
        sleep: async (ms) => {
          clock.sleeps.push(ms);
          clock.now += ms;
        },
        now: () => clock.now
      }
    ),
    ledger,
    materials: new MaterialTrigger({
      webhookUrl: "https://automation.example.test/hooks/materials",
      ledger,
      fetchImpl: remote.fetch
    }),
    platformApiKey: "test-heroku-key",
    defaultRepoName: "generated-app",
    unmappedImportPolicy: "drop",
    newId: () => {
      issued += 1;
      return `id-${issued}`;
    }
  });

  return { remote, pool, ledger, clock, keyPair, workflow };
}

export function openSealed(sealedBase64: string, keyPair: { publicKey: Uint8Array; privateKey: Uint8Array }): string {
  const sealed = sodium.from_base64(sealedBase64, sodium.base64_variants.ORIGINAL);
  return sodium.to_string(sodium.crypto_box_seal_open(sealed, keyPair.publicKey, keyPair.privateKey));
}
