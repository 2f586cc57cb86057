// Triage ranking for Bug Sleuth.
// Asks a language model which candidate repositories most likely hold
// the root cause of a bug. Two backends sit behind one TriageRanker
// interface: the Anthropic Messages API, or a coding-agent CLI run as
// a subprocess. Either way the answer is parsed, thresholded, sorted by
// confidence and capped.
// Limitations: Backend failures are reported as an empty ranking, so a
//   caller cannot tell "nothing relevant" from "model unavailable"
//   except through the logs.

import Anthropic from "@anthropic-ai/sdk";

import {
  DEFAULT_CLAUDE_TRIAGE_MODEL,
  buildTriageArgs,
  resolveProvider,
  runAgentCli,
  type AgentProvider,
} from "./agentCli.js";
import type { CommandRunner } from "./commandRunner.js";
import { ConfigurationError, errorMessage } from "./errors.js";
import { logger } from "./logger.js";
import { byConfidenceDesc } from "./models.js";
import { parseTriageResponse } from "./responseParser.js";
import type {
  BugReport,
  Repository,
  TriageConfig,
  TriageResult,
} from "./types.js";

const API_TIMEOUT_MS = 30 * 1000;
const API_MAX_TOKENS = 1024;

export interface TriageRanker {
  rank(bug: BugReport, candidates: readonly Repository[]): Promise<TriageResult[]>;
}

// ============================================================
// Prompt
// ============================================================

export function formatBugDetails(bug: BugReport): string[] {
  const lines = [`**Key:** ${bug.key}`, `**Summary:** ${bug.summary}`];
  if (bug.description) lines.push(`**Description:** ${bug.description}`);
  if (bug.priority) lines.push(`**Priority:** ${bug.priority}`);
  if (bug.components.length > 0) {
    lines.push(`**Components:** ${bug.components.join(", ")}`);
  }
  if (bug.labels.length > 0) lines.push(`**Labels:** ${bug.labels.join(", ")}`);
  return lines;
}

function formatCandidate(repo: Repository): string {
  let line = `- **${repo.name}**`;
  if (repo.description) line += `: ${repo.description}`;

  const details: string[] = [];
  if (repo.githubSlug) details.push(`slug=${repo.githubSlug}`);
  if (repo.componentType) details.push(`type=${repo.componentType}`);
  if (repo.tags.length > 0) details.push(`tags=${repo.tags.join(",")}`);
  if (details.length > 0) line += ` (${details.join("; ")})`;

  return line;
}

export function buildTriagePrompt(
  bug: BugReport,
  candidates: readonly Repository[]
): string {
  return [
    "You are a bug triage assistant. Given a bug report and a list of repositories, " +
      "rank which repositories are most likely to contain the root cause.",
    "",
    "## Bug Report",
    ...formatBugDetails(bug),
    "",
    "## Repositories",
    ...candidates.map(formatCandidate),
    "",
    'Respond with a JSON array of objects, each with "repo" (repository name), ' +
      '"confidence" (0.0 to 1.0), and "reasoning" (brief explanation). ' +
      "Sort by confidence descending. Only include repositories that might be relevant.",
  ].join("\n");
}

// ============================================================
// Selection
// ============================================================

export interface SelectionLimits {
  minConfidence: number;
  maxRepos: number;
}

export function selectTopCandidates(
  results: readonly TriageResult[],
  limits: SelectionLimits
): TriageResult[] {
  return results
    .filter((result) => result.confidence >= limits.minConfidence)
    .sort(byConfidenceDesc)
    .slice(0, limits.maxRepos);
}

// ============================================================
// Direct API backend
// ============================================================

export class ApiTriageRanker implements TriageRanker {
  private config: TriageConfig;
  private client: Anthropic;

  constructor(config: TriageConfig) {
    if (resolveProvider(config.provider) !== "claude") {
      throw new ConfigurationError(
        'The API triage backend only supports provider "claude".'
      );
    }
    if (!config.anthropicApiKey) {
      throw new ConfigurationError(
        "ANTHROPIC_API_KEY is required for the API triage backend."
      );
    }
    this.config = config;
    this.client = new Anthropic({
      apiKey: config.anthropicApiKey,
      timeout: API_TIMEOUT_MS,
      maxRetries: 0,
    });
  }

  async rank(
    bug: BugReport,
    candidates: readonly Repository[]
  ): Promise<TriageResult[]> {
    if (candidates.length === 0) {
      logger.info("No candidate repositories to triage.");
      return [];
    }

    const model = this.config.model ?? DEFAULT_CLAUDE_TRIAGE_MODEL;
    logger.info("Requesting triage ranking from the Messages API.", {
      bug: bug.key,
      candidates: candidates.length,
      model,
    });

    let raw: string;
    try {
      const message = await this.client.messages.create({
        model,
        max_tokens: API_MAX_TOKENS,
        messages: [{ role: "user", content: buildTriagePrompt(bug, candidates) }],
      });
      raw = message.content
        .map((block) => (block.type === "text" ? block.text : ""))
        .join("");
    } catch (error) {
      logger.error("Messages API triage request failed.", {
        error: errorMessage(error),
      });
      return [];
    }

    return selectTopCandidates(parseTriageResponse(raw), this.config);
  }
}

// ============================================================
// Subprocess backend
// ============================================================

export class CliTriageRanker implements TriageRanker {
  private config: TriageConfig;
  private provider: AgentProvider;
  private runner: CommandRunner | undefined;

  constructor(config: TriageConfig, runner?: CommandRunner) {
    this.config = config;
    this.provider = resolveProvider(config.provider);
    this.runner = runner;
  }

  async rank(
    bug: BugReport,
    candidates: readonly Repository[]
  ): Promise<TriageResult[]> {
    if (candidates.length === 0) {
      logger.info("No candidate repositories to triage.");
      return [];
    }

    logger.info(`Requesting triage ranking from the ${this.provider} CLI.`, {
      bug: bug.key,
      candidates: candidates.length,
    });

    const prompt = buildTriagePrompt(bug, candidates);
    const raw = await runAgentCli(
      this.provider,
      (outputFile) =>
        buildTriageArgs(this.provider, prompt, {
          model: this.config.model,
          outputFile,
        }),
      {
        label: "triage",
        timeoutMs: this.config.timeoutSeconds * 1000,
        runner: this.runner,
      }
    );
    if (raw === null) {
      return [];
    }

    return selectTopCandidates(parseTriageResponse(raw), this.config);
  }
}

// ============================================================
// Factory
// ============================================================

export interface TriageRankerOptions {
  runner?: CommandRunner;
}

// Throws ConfigurationError for an unknown provider or a missing API key.
export function createTriageRanker(
  config: TriageConfig,
  options: TriageRankerOptions = {}
): TriageRanker {
  const provider = resolveProvider(config.provider);
  if (provider === "codex" || config.useSubprocess) {
    return new CliTriageRanker(config, options.runner);
  }
  return new ApiTriageRanker(config);
}
