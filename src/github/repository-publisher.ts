import { PublishError } from "../lib/errors.js";
import { logInfo, logWarn } from "../lib/logging.js";
import { shortHexId, slugifyRepoName } from "../lib/strings.js";
import { CommittedFile, RemoteRepository } from "../types.js";
import { GitHubClient, RepositoryNameTakenError } from "./github-client.js";

const MAX_SUFFIX_DRAWS = 16;

interface RepositoryPublisherOptions {
  suffix?: () => string;
}

export interface PublishFile {
  path: string;
  content: string;
}

export class RepositoryPublisher {
  private readonly github: GitHubClient;
  private readonly suffix: () => string;

  constructor(github: GitHubClient, options: RepositoryPublisherOptions = {}) {
    this.github = github;
    this.suffix = options.suffix ?? shortHexId;
  }

  /** Picks `base`, or `base-<suffix>` when `base` collides with any of `existingNames`. */
  uniqueName(base: string, existingNames: Iterable<string>): string {
    const taken = new Set(Array.from(existingNames, (name) => name.toLowerCase()));
    if (!taken.has(base.toLowerCase())) {
      return base;
    }

    for (let attempt = 0; attempt < MAX_SUFFIX_DRAWS; attempt += 1) {
      const candidate = `${base}-${this.suffix()}`;
      if (!taken.has(candidate.toLowerCase())) {
        return candidate;
      }
    }

    throw new PublishError(`Could not derive a free repository name from '${base}'.`, { base });
  }

  async createRepository(requestedName: string, description?: string): Promise<RemoteRepository> {
    const base = slugifyRepoName(requestedName);
    const observed = await this.github.listOwnedRepositoryNames();
    const name = this.uniqueName(base, observed);

    try {
      const repo = await this.github.createRepository(name, { description });
      logInfo("publish.repository_created", { repo: repo.fullName, requestedName });
      return repo;
    } catch (error) {
      if (!(error instanceof RepositoryNameTakenError)) {
        throw error;
      }

      // Someone took the name between listing and creating; one more draw only.
      const retryName = this.uniqueName(base, [...observed, name]);
      logWarn("publish.repository_name_race", { name, retryName });

      try {
        const repo = await this.github.createRepository(retryName, { description });
        logInfo("publish.repository_created", { repo: repo.fullName, requestedName });
        return repo;
      } catch (retryError) {
        if (retryError instanceof RepositoryNameTakenError) {
          throw new PublishError(`Repository name '${retryError.repoName}' is already taken.`, {
            requestedName
          });
        }
        throw retryError;
      }
    }
  }

  /**
   * Commits each file in order. A failure stops the sequence and reports the
   * files that already landed; nothing is reverted.
   */
  async publishFiles(repo: RemoteRepository, files: PublishFile[]): Promise<CommittedFile[]> {
    const committed: CommittedFile[] = [];

    for (const file of files) {
      try {
        const sha = await this.github.putFile(repo, {
          path: file.path,
          content: file.content,
          message: `add ${file.path}`
        });
        committed.push({ path: file.path, sha });
      } catch (error) {
        throw new PublishError(
          `Failed to commit ${file.path}: ${error instanceof Error ? error.message : String(error)}`,
          { repo: repo.fullName, failedPath: file.path, committed: committed.map((entry) => entry.path) },
          { cause: error }
        );
      }
    }

    logInfo("publish.files_committed", { repo: repo.fullName, count: committed.length });
    return committed;
  }

  /** Writes `content` to `path`, updating in place when the file already exists. */
  async upsertFile(repo: RemoteRepository, file: PublishFile, message: string): Promise<CommittedFile> {
    try {
      const existingSha = await this.github.getFileSha(repo, file.path);
      const sha = await this.github.putFile(repo, {
        path: file.path,
        content: file.content,
        message,
        sha: existingSha
      });
      return { path: file.path, sha };
    } catch (error) {
      throw new PublishError(
        `Failed to write ${file.path}: ${error instanceof Error ? error.message : String(error)}`,
        { repo: repo.fullName, failedPath: file.path },
        { cause: error }
      );
    }
  }
}
