// Calling convention for the coding-agent CLIs (claude, codex).
// Builds the argument list for a triage or investigation run, launches
// the process, and reads its answer. The two providers return their
// answer differently: claude prints a JSON envelope on stdout, codex
// writes its last message to a file named on the command line.
// Limitations: The prompt travels as a single argv entry, so it is
//   bounded by the platform's argument length limit.

import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";

import { runCommand, type CommandRunner } from "./commandRunner.js";
import {
  CommandNotFoundError,
  CommandTimeoutError,
  ConfigurationError,
  errorMessage,
} from "./errors.js";
import { excerpt, logger } from "./logger.js";
import { unwrapEnvelope } from "./responseParser.js";

export type AgentProvider = "claude" | "codex";

export const SUPPORTED_PROVIDERS: readonly AgentProvider[] = ["claude", "codex"];

export const DEFAULT_CLAUDE_TRIAGE_MODEL = "claude-haiku-4-5-20251001";
export const DEFAULT_CLAUDE_INVESTIGATION_MODEL = "claude-sonnet-4-6";

const INVESTIGATION_ALLOWED_TOOLS = "Bash(git log:*),Read,Grep,Glob";

export function resolveProvider(provider: string): AgentProvider {
  const normalized = provider.trim().toLowerCase();
  const match = SUPPORTED_PROVIDERS.find((candidate) => candidate === normalized);
  if (!match) {
    throw new ConfigurationError(
      `Unsupported provider "${provider}". Supported providers: ${SUPPORTED_PROVIDERS.join(", ")}`
    );
  }
  return match;
}

// ============================================================
// Argument lists
// ============================================================

export interface TriageCommandOptions {
  model: string | null;
  outputFile: string | null;
}

export function buildTriageArgs(
  provider: AgentProvider,
  prompt: string,
  options: TriageCommandOptions
): string[] {
  switch (provider) {
    case "claude": {
      const args = ["-p", prompt, "--output-format", "json"];
      if (options.model) {
        args.push("--model", options.model);
      }
      return args;
    }
    case "codex": {
      const args = ["exec", prompt, "--color", "never"];
      if (options.model) {
        args.push("--model", options.model);
      }
      if (options.outputFile) {
        args.push("--output-last-message", options.outputFile);
      }
      return args;
    }
  }
}

export interface InvestigationCommandOptions {
  model: string | null;
  repoDir: string;
  maxBudgetUsd: number;
  outputFile: string | null;
}

export function buildInvestigationArgs(
  provider: AgentProvider,
  prompt: string,
  options: InvestigationCommandOptions
): string[] {
  switch (provider) {
    case "claude":
      return [
        "-p",
        prompt,
        "--output-format",
        "json",
        "--model",
        options.model ?? DEFAULT_CLAUDE_INVESTIGATION_MODEL,
        "--allowedTools",
        INVESTIGATION_ALLOWED_TOOLS,
        "--add-dir",
        options.repoDir,
        "--max-budget-usd",
        String(options.maxBudgetUsd),
      ];
    case "codex": {
      const args = [
        "exec",
        prompt,
        "--cd",
        options.repoDir,
        "--color",
        "never",
      ];
      if (options.model) {
        args.push("--model", options.model);
      }
      if (options.outputFile) {
        args.push("--output-last-message", options.outputFile);
      }
      return args;
    }
  }
}

// ============================================================
// Invocation
// ============================================================

export interface AgentRunOptions {
  // Used in log lines, e.g. "triage" or the repository name.
  label: string;
  timeoutMs: number;
  cwd?: string;
  runner?: CommandRunner;
}

// Returns the agent's answer text, or null when the run produced nothing
// usable (no temp directory, CLI missing, non-zero exit, timeout).
// Failures are logged here.
export async function runAgentCli(
  provider: AgentProvider,
  buildArgs: (outputFile: string | null) => string[],
  options: AgentRunOptions
): Promise<string | null> {
  const runner = options.runner ?? runCommand;

  switch (provider) {
    case "claude": {
      const stdout = await invoke(provider, buildArgs(null), runner, options);
      return stdout === null ? null : unwrapEnvelope(stdout);
    }
    case "codex": {
      let outputDir: string;
      try {
        outputDir = await mkdtemp(join(tmpdir(), "bug-sleuth-agent-"));
      } catch (error) {
        logger.error(`Could not create an output directory for ${options.label}.`, {
          error: errorMessage(error),
        });
        return null;
      }
      const outputFile = join(outputDir, "last-message.txt");
      try {
        const stdout = await invoke(provider, buildArgs(outputFile), runner, options);
        if (stdout === null) {
          return null;
        }
        const written = await readOptionalFile(outputFile);
        return written.trim() !== "" ? written : stdout;
      } finally {
        await rm(outputDir, { recursive: true, force: true });
      }
    }
  }
}

async function invoke(
  provider: AgentProvider,
  args: string[],
  runner: CommandRunner,
  options: AgentRunOptions
): Promise<string | null> {
  logger.debug(`Running ${provider} for ${options.label}.`, {
    timeoutMs: options.timeoutMs,
  });

  try {
    const result = await runner(provider, args, {
      cwd: options.cwd,
      timeoutMs: options.timeoutMs,
    });
    if (result.exitCode !== 0) {
      logger.error(`${provider} CLI exited with code ${result.exitCode} for ${options.label}.`, {
        stderr: excerpt(result.stderr, 500),
      });
      return null;
    }
    return result.stdout;
  } catch (error) {
    if (error instanceof CommandNotFoundError) {
      logger.error(`${provider} CLI not found. Install it or choose another provider.`);
    } else if (error instanceof CommandTimeoutError) {
      logger.error(`${provider} CLI timed out for ${options.label}.`, {
        timeoutMs: error.timeoutMs,
      });
    } else {
      logger.error(`${provider} CLI failed for ${options.label}.`, {
        error: errorMessage(error),
      });
    }
    return null;
  }
}

async function readOptionalFile(path: string): Promise<string> {
  try {
    return await readFile(path, "utf-8");
  } catch (error) {
    logger.debug("Agent output file was not written.", {
      path,
      error: errorMessage(error),
    });
    return "";
  }
}
