// GitHub API client for Bug Sleuth.
// Wraps Octokit to provide the branch, file and pull request operations
// that turn a proposed fix into a live PR.
// Uses the configured token, or falls back to the gh CLI auth token.
// Limitations: Rate limiting is handled by Octokit built-in throttling.
//   Files are written one commit per file through the contents API.

import { Octokit } from "octokit";

import { runCommand, type CommandRunner } from "./commandRunner.js";
import { errorMessage } from "./errors.js";
import { logger } from "./logger.js";
import type { FileContent, SourceHost } from "./types.js";

const GH_AUTH_TIMEOUT_MS = 10_000;

export class GitHubClient implements SourceHost {
  private octokit: Octokit;

  constructor(token?: string) {
    this.octokit = new Octokit({
      auth: token,
    });
  }

  // ============================================================
  // Factory: configured token first, then gh CLI auth token
  // ============================================================

  static async create(token?: string, runner: CommandRunner = runCommand): Promise<GitHubClient> {
    if (token && token.trim()) {
      logger.debug("GitHub client authenticated via configured token.");
      return new GitHubClient(token.trim());
    }

    try {
      const { exitCode, stdout, stderr } = await runner("gh", ["auth", "token"], {
        timeoutMs: GH_AUTH_TIMEOUT_MS,
      });
      if (exitCode !== 0) {
        throw new Error(stderr.trim() || `gh exited with code ${exitCode}`);
      }
      const ghToken = stdout.trim();
      if (!ghToken) {
        throw new Error("gh auth token returned empty string.");
      }
      logger.debug("GitHub client authenticated via gh CLI.");
      return new GitHubClient(ghToken);
    } catch (error) {
      throw new Error(
        `Failed to get GitHub token. Set GITHUB_TOKEN or run 'gh auth login'. Error: ${errorMessage(error)}`
      );
    }
  }

  // ============================================================
  // Branches
  // ============================================================

  async getDefaultBranch(owner: string, repo: string): Promise<string> {
    logger.debug("Fetching default branch.", { owner, repo });
    const { data } = await this.octokit.rest.repos.get({ owner, repo });
    return data.default_branch;
  }

  async getBranchSha(owner: string, repo: string, branch: string): Promise<string> {
    const { data } = await this.octokit.rest.git.getRef({
      owner,
      repo,
      ref: `heads/${branch}`,
    });
    return data.object.sha;
  }

  async createBranch(
    owner: string,
    repo: string,
    branch: string,
    fromSha: string
  ): Promise<void> {
    logger.debug("Creating branch.", { owner, repo, branch });
    await this.octokit.rest.git.createRef({
      owner,
      repo,
      ref: `refs/heads/${branch}`,
      sha: fromSha,
    });
  }

  // ============================================================
  // Files
  // ============================================================

  async getFileContent(
    owner: string,
    repo: string,
    path: string,
    ref: string
  ): Promise<FileContent> {
    const { data } = await this.octokit.rest.repos.getContent({
      owner,
      repo,
      path,
      ref,
    });

    if (Array.isArray(data) || data.type !== "file" || !("content" in data)) {
      throw new Error(`${path} is not a file in ${owner}/${repo}@${ref}.`);
    }

    return {
      content: Buffer.from(data.content, "base64").toString("utf-8"),
      sha: data.sha,
    };
  }

  async updateFile(params: {
    owner: string;
    repo: string;
    path: string;
    content: string;
    message: string;
    branch: string;
    sha: string | null;
  }): Promise<void> {
    logger.debug("Writing file.", {
      owner: params.owner,
      repo: params.repo,
      path: params.path,
      branch: params.branch,
      create: params.sha === null,
    });
    await this.octokit.rest.repos.createOrUpdateFileContents({
      owner: params.owner,
      repo: params.repo,
      path: params.path,
      message: params.message,
      content: Buffer.from(params.content, "utf-8").toString("base64"),
      branch: params.branch,
      ...(params.sha !== null ? { sha: params.sha } : {}),
    });
  }

  // ============================================================
  // Pull Requests
  // ============================================================

  async createPullRequest(params: {
    owner: string;
    repo: string;
    title: string;
    body: string;
    head: string;
    base: string;
  }): Promise<{ number: number; htmlUrl: string }> {
    logger.debug("Creating pull request.", {
      owner: params.owner,
      repo: params.repo,
      head: params.head,
      base: params.base,
    });
    const { data } = await this.octokit.rest.pulls.create(params);
    return { number: data.number, htmlUrl: data.html_url };
  }
}
