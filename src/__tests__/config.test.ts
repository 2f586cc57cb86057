import { describe, expect, it } from "vitest";

import { loadConfig, parseCommaSeparated } from "../config.js";
import { ConfigurationError } from "../errors.js";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    const config = loadConfig({});

    expect(config.logLevel).toBe("info");
    expect(config.triage).toEqual({
      provider: "codex",
      anthropicApiKey: "",
      model: null,
      maxRepos: 5,
      minConfidence: 0.3,
      useSubprocess: false,
      timeoutSeconds: 120,
    });
    expect(config.investigation).toMatchObject({
      provider: "codex",
      model: null,
      maxBudgetUsd: 0.5,
      cloneDepth: 100,
      cloneProtocol: "https",
      agentTimeoutSeconds: 300,
      maxParallelAgents: 3,
      highConfidenceThreshold: 0.8,
      uncertainConfidenceThreshold: 0.5,
      githubToken: "",
    });
    expect(config.catalog.useLocalFile).toBe(true);
    expect(config.catalog.localFilePath).toBe("catalog.json");
    expect(config.catalog.ownerGroup).toBe(config.catalog.team);
  });

  it("reads overrides", () => {
    const config = loadConfig({
      LLM_PROVIDER: " Claude ",
      TRIAGE_MODEL: "test-triage-model",
      TRIAGE_MAX_REPOS: "2",
      TRIAGE_USE_SUBPROCESS: "yes",
      MAX_PARALLEL_AGENTS: "1",
      CLONE_PROTOCOL: "SSH",
      SLEUTH_LOG_LEVEL: "debug",
      CATALOG_TEAM: "payments",
      CATALOG_DEFAULT_SLUGS: "checkout, ,billing",
      JIRA_BASE_URL: "https://jira.example.com/",
    });

    expect(config.logLevel).toBe("debug");
    expect(config.triage.provider).toBe("claude");
    expect(config.investigation.provider).toBe("claude");
    expect(config.triage.model).toBe("test-triage-model");
    expect(config.triage.maxRepos).toBe(2);
    expect(config.triage.useSubprocess).toBe(true);
    expect(config.investigation.maxParallelAgents).toBe(1);
    expect(config.investigation.cloneProtocol).toBe("ssh");
    expect(config.catalog.ownerGroup).toBe("payments");
    expect(config.catalog.defaultSlugs).toEqual(["checkout", "billing"]);
    expect(config.jira.baseUrl).toBe("https://jira.example.com");
  });

  it("falls back to GH_TOKEN for the GitHub token", () => {
    const config = loadConfig({ GH_TOKEN: "test-secret" });

    expect(config.github).toEqual({ token: "test-secret" });
    expect(config.investigation.githubToken).toBe("test-secret");
  });

  it.each([
    ["MAX_PARALLEL_AGENTS", "0"],
    ["MAX_PARALLEL_AGENTS", "1.5"],
    ["TRIAGE_MAX_REPOS", "many"],
    ["INVESTIGATION_MAX_BUDGET_USD", "-1"],
    ["TRIAGE_MIN_CONFIDENCE", "1.2"],
    ["TRIAGE_USE_SUBPROCESS", "maybe"],
    ["SLEUTH_LOG_LEVEL", "verbose"],
    ["CLONE_PROTOCOL", "ftp"],
  ])("rejects %s=%s", (name, value) => {
    expect(() => loadConfig({ [name]: value })).toThrow(ConfigurationError);
  });

  it("rejects an uncertain threshold above the high threshold", () => {
    expect(() =>
      loadConfig({ HIGH_CONFIDENCE_THRESHOLD: "0.6", UNCERTAIN_CONFIDENCE_THRESHOLD: "0.7" })
    ).toThrow(
      "Configuration error: UNCERTAIN_CONFIDENCE_THRESHOLD (0.7) must not exceed HIGH_CONFIDENCE_THRESHOLD (0.6)."
    );
  });
});

describe("parseCommaSeparated", () => {
  it("trims entries and drops empty ones", () => {
    expect(parseCommaSeparated(" a, b ,,c ")).toEqual(["a", "b", "c"]);
    expect(parseCommaSeparated(undefined)).toEqual([]);
    expect(parseCommaSeparated("   ")).toEqual([]);
  });
});
