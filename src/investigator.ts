// Investigation executor for Bug Sleuth.
// Runs a coding agent against one cloned repository with a prompt that
// asks it to explore history and source, then parses the structured
// verdict it returns. Any failure (CLI missing, non-zero exit, timeout,
// unparseable answer) yields null for that repository.
// Limitations: The agent works read-only; a proposed fix is returned as
//   text and is never applied to the workspace.

import {
  buildInvestigationArgs,
  resolveProvider,
  runAgentCli,
  type AgentProvider,
} from "./agentCli.js";
import type { CommandRunner } from "./commandRunner.js";
import { logger } from "./logger.js";
import { parseInvestigationResponse } from "./responseParser.js";
import { formatBugDetails } from "./triageRanker.js";
import type {
  BugReport,
  InvestigationConfig,
  InvestigationResult,
} from "./types.js";

const RESPONSE_SCHEMA = [
  "{",
  '  "root_cause_found": bool,',
  '  "confidence": float (0.0-1.0),',
  '  "root_cause": "description of root cause",',
  '  "evidence": ["list of evidence found"],',
  '  "recent_suspect_commits": ["commit hashes"],',
  '  "proposed_fix": {',
  '    "description": "what the fix does",',
  '    "files_changed": [{"path": "src/file.ts", "diff": "complete new file content"}]',
  "  },",
  '  "next_steps": ["suggested follow-up actions"]',
  "}",
].join("\n");

export function buildInvestigationPrompt(bug: BugReport, repoName: string): string {
  return [
    "You are a senior software engineer investigating a production bug. " +
      "You have access to a cloned repository. Explore the codebase to find " +
      "the root cause and, if possible, propose a fix.",
    "",
    "## Bug Report",
    ...formatBugDetails(bug),
    "",
    `## Repository: ${repoName}`,
    "",
    "Investigate this repository for the root cause of the bug above. " +
      "Use `git log`, `Grep`, `Glob`, and `Read` to explore the code. " +
      "Look at recent commits, relevant source files, error handling, and test coverage.",
    "",
    "Respond with a single JSON object (no markdown fences) with these fields:",
    RESPONSE_SCHEMA,
  ].join("\n");
}

export interface RepositoryInvestigator {
  investigate(
    bug: BugReport,
    repoName: string,
    repoDir: string
  ): Promise<InvestigationResult | null>;
}

export class Investigator implements RepositoryInvestigator {
  private config: InvestigationConfig;
  private provider: AgentProvider;
  private runner: CommandRunner | undefined;

  constructor(config: InvestigationConfig, runner?: CommandRunner) {
    this.config = config;
    this.provider = resolveProvider(config.provider);
    this.runner = runner;
  }

  async investigate(
    bug: BugReport,
    repoName: string,
    repoDir: string
  ): Promise<InvestigationResult | null> {
    const prompt = buildInvestigationPrompt(bug, repoName);

    logger.info(`Investigating ${repoName} with ${this.provider}.`, {
      bug: bug.key,
      repoDir,
      maxBudgetUsd: this.config.maxBudgetUsd,
    });

    const raw = await runAgentCli(
      this.provider,
      (outputFile) =>
        buildInvestigationArgs(this.provider, prompt, {
          model: this.config.model,
          repoDir,
          maxBudgetUsd: this.config.maxBudgetUsd,
          outputFile,
        }),
      {
        label: repoName,
        timeoutMs: this.config.agentTimeoutSeconds * 1000,
        cwd: repoDir,
        runner: this.runner,
      }
    );
    if (raw === null) {
      return null;
    }

    const result = parseInvestigationResponse(raw, repoName);
    if (result) {
      logger.info(`Investigation of ${repoName} finished.`, {
        rootCauseFound: result.rootCauseFound,
        confidence: result.confidence,
        fileChanges: result.proposedFix?.filesChanged.length ?? 0,
      });
    }
    return result;
  }
}
