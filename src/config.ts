// Configuration loader for Bug Sleuth.
// Builds one explicit Config object from an environment map and
// validates numeric ranges, booleans and enumerations. The entry
// point loads .env (dotenv) once before calling loadConfig.
// Limitations: Only supports environment variable configuration,
//   no config file support.

import { ConfigurationError } from "./errors.js";
import type { CloneProtocol, Config, LogLevel } from "./types.js";

type Env = Record<string, string | undefined>;

const VALID_LOG_LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];
const VALID_CLONE_PROTOCOLS: CloneProtocol[] = ["https", "ssh"];
const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

export const DEFAULT_PROVIDER = "codex";

export function loadConfig(env: Env = process.env): Config {
  const provider = readString(env.LLM_PROVIDER, DEFAULT_PROVIDER).toLowerCase();

  const highConfidenceThreshold = parseFraction(
    env.HIGH_CONFIDENCE_THRESHOLD,
    0.8
  );
  const uncertainConfidenceThreshold = parseFraction(
    env.UNCERTAIN_CONFIDENCE_THRESHOLD,
    0.5
  );
  if (uncertainConfidenceThreshold > highConfidenceThreshold) {
    throw new ConfigurationError(
      `UNCERTAIN_CONFIDENCE_THRESHOLD (${uncertainConfidenceThreshold}) must not exceed HIGH_CONFIDENCE_THRESHOLD (${highConfidenceThreshold}).`
    );
  }

  const githubToken = readString(env.GITHUB_TOKEN, readString(env.GH_TOKEN, ""));
  const team = readString(env.CATALOG_TEAM, "team");

  return {
    logLevel: parseLogLevel(env.SLEUTH_LOG_LEVEL),
    triage: {
      provider,
      anthropicApiKey: readString(env.ANTHROPIC_API_KEY, ""),
      model: readString(env.TRIAGE_MODEL, "") || null,
      maxRepos: parsePositiveInt(env.TRIAGE_MAX_REPOS, 5),
      minConfidence: parseFraction(env.TRIAGE_MIN_CONFIDENCE, 0.3),
      useSubprocess: parseBoolean(env.TRIAGE_USE_SUBPROCESS, false),
      timeoutSeconds: parsePositiveNumber(env.TRIAGE_TIMEOUT_SECONDS, 120),
    },
    investigation: {
      provider,
      model: readString(env.INVESTIGATION_MODEL, "") || null,
      maxBudgetUsd: parsePositiveNumber(env.INVESTIGATION_MAX_BUDGET_USD, 0.5),
      cloneDepth: parsePositiveInt(env.CLONE_DEPTH, 100),
      cloneTimeoutSeconds: parsePositiveNumber(env.CLONE_TIMEOUT_SECONDS, 120),
      cloneProtocol: parseCloneProtocol(env.CLONE_PROTOCOL),
      agentTimeoutSeconds: parsePositiveNumber(env.AGENT_TIMEOUT_SECONDS, 300),
      maxParallelAgents: parsePositiveInt(env.MAX_PARALLEL_AGENTS, 3),
      highConfidenceThreshold,
      uncertainConfidenceThreshold,
      githubToken,
    },
    github: {
      token: githubToken,
    },
    jira: {
      baseUrl: stripTrailingSlash(
        readString(env.JIRA_BASE_URL, "https://jira.example.com")
      ),
      email: readString(env.JIRA_EMAIL, ""),
      apiToken: readString(env.JIRA_API_TOKEN, ""),
    },
    slack: {
      botToken: readString(env.SLACK_BOT_TOKEN, ""),
      channel: readString(env.SLACK_CHANNEL, ""),
    },
    catalog: {
      baseUrl: stripTrailingSlash(
        readString(env.CATALOG_BASE_URL, "https://catalog.example.com/api/catalog")
      ),
      token: readString(env.CATALOG_TOKEN, ""),
      team,
      ownerGroup: readString(env.CATALOG_OWNER_GROUP, team),
      defaultSlugs: parseCommaSeparated(env.CATALOG_DEFAULT_SLUGS),
      // Local file mode is the default so the tool works offline.
      useLocalFile: parseBoolean(env.CATALOG_USE_LOCAL_FILE, true),
      localFilePath: readString(env.CATALOG_LOCAL_FILE_PATH, "catalog.json"),
      cacheTtlSeconds: parsePositiveNumber(env.CATALOG_CACHE_TTL_SECONDS, 3600),
    },
  };
}

function readString(value: string | undefined, defaultValue: string): string {
  const trimmed = value?.trim();
  return trimmed ? trimmed : defaultValue;
}

function stripTrailingSlash(value: string): string {
  return value.replace(/\/+$/, "");
}

export function parseCommaSeparated(value: string | undefined): string[] {
  if (!value || value.trim() === "") {
    return [];
  }
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parsePositiveInt(
  value: string | undefined,
  defaultValue: number
): number {
  if (!value || value.trim() === "") {
    return defaultValue;
  }
  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(
      `Expected a positive integer but got "${value}".`
    );
  }
  return parsed;
}

function parsePositiveNumber(
  value: string | undefined,
  defaultValue: number
): number {
  if (!value || value.trim() === "") {
    return defaultValue;
  }
  const parsed = Number(value.trim());
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigurationError(
      `Expected a positive number but got "${value}".`
    );
  }
  return parsed;
}

function parseFraction(value: string | undefined, defaultValue: number): number {
  if (!value || value.trim() === "") {
    return defaultValue;
  }
  const parsed = Number(value.trim());
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new ConfigurationError(
      `Expected a number between 0 and 1 but got "${value}".`
    );
  }
  return parsed;
}

function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (!value || value.trim() === "") {
    return defaultValue;
  }
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  throw new ConfigurationError(`Expected a boolean but got "${value}".`);
}

function parseLogLevel(value: string | undefined): LogLevel {
  const level = value?.trim().toLowerCase() || "info";
  const match = VALID_LOG_LEVELS.find((candidate) => candidate === level);
  if (!match) {
    throw new ConfigurationError(
      `Invalid log level "${value}". Valid levels: ${VALID_LOG_LEVELS.join(", ")}`
    );
  }
  return match;
}

function parseCloneProtocol(value: string | undefined): CloneProtocol {
  const protocol = value?.trim().toLowerCase() || "https";
  const match = VALID_CLONE_PROTOCOLS.find((candidate) => candidate === protocol);
  if (!match) {
    throw new ConfigurationError(
      `Invalid clone protocol "${value}". Valid protocols: ${VALID_CLONE_PROTOCOLS.join(", ")}`
    );
  }
  return match;
}
