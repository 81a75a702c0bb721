import { SecretError } from "../lib/errors.js";
import { logInfo } from "../lib/logging.js";
import { RemoteRepository } from "../types.js";
import { GitHubClient } from "./github-client.js";
import { sealSecret } from "./sealed-box.js";

export class SecretProvisioner {
  private readonly github: GitHubClient;

  constructor(github: GitHubClient) {
    this.github = github;
  }

  /** Fetches the repository key fresh on every call; keys are never cached across repositories. */
  async provision(repo: RemoteRepository, secretName: string, plaintext: string): Promise<{ keyId: string }> {
    try {
      const publicKey = await this.github.getActionsPublicKey(repo);
      const encrypted = await sealSecret(publicKey.key, plaintext);
      await this.github.putActionsSecret(repo, secretName, encrypted, publicKey.keyId);

      logInfo("secret.provisioned", { repo: repo.fullName, secretName, keyId: publicKey.keyId });
      return { keyId: publicKey.keyId };
    } catch (error) {
      throw new SecretError(
        `Failed to provision secret ${secretName}: ${error instanceof Error ? error.message : String(error)}`,
        { repo: repo.fullName, secretName },
        { cause: error }
      );
    }
  }
}
