import { describe, expect, it, vi, type Mock } from "vitest";

import { aggregateFindings } from "../aggregator.js";
import { parseCliArgs, runCli, type CliDependencies, type InvestigationRunner } from "../cli.js";
import { UsageError } from "../errors.js";
import { createTriageResult } from "../models.js";
import { formatJiraComment } from "../reporter.js";
import type { TriageRanker } from "../triageRanker.js";
import type {
  InvestigationConfig,
  InvestigationResult,
  TriageConfig,
  TriageResult,
} from "../types.js";
import {
  PR_URL,
  fakeSourceHost,
  fakeTracker,
  makeBug,
  makeConfig,
  makeRepo,
  makeResult,
} from "./fixtures.js";

const CATALOG = [
  makeRepo("search", { owner: "group:payments-search" }),
  makeRepo("checkout", { owner: "group:payments-team" }),
  makeRepo("recommendations", { owner: "group:discovery" }),
];

const RANKING = [
  createTriageResult({ repo: "checkout", confidence: 0.9, reasoning: "payment path" }),
  createTriageResult({ repo: "search", confidence: 0.4 }),
];

const VERDICT = makeResult({
  repo: "checkout",
  rootCauseFound: true,
  confidence: 0.9,
  rootCause: "Null card token",
  evidence: ["handler.ts:42"],
  proposedFix: {
    description: "Guard the token",
    filesChanged: [{ path: "src/handler.ts", diff: "guarded" }],
  },
});

interface Harness {
  lines: string[];
  deps: CliDependencies;
  rank: Mock<TriageRanker["rank"]>;
  rankerConfigs: TriageConfig[];
  investigationConfigs: InvestigationConfig[];
  tracker: ReturnType<typeof fakeTracker>;
  host: ReturnType<typeof fakeSourceHost>;
  createSourceHost: Mock<NonNullable<CliDependencies["createSourceHost"]>>;
}

function harness(
  ranking: TriageResult[] = RANKING,
  verdicts: InvestigationResult[] = [VERDICT]
): Harness {
  const lines: string[] = [];
  const rank = vi.fn<TriageRanker["rank"]>(async () => ranking);
  const rankerConfigs: TriageConfig[] = [];
  const investigationConfigs: InvestigationConfig[] = [];
  const tracker = fakeTracker();
  const host = fakeSourceHost();
  const runner: InvestigationRunner = { investigateAll: async () => verdicts };
  const createSourceHost = vi.fn<NonNullable<CliDependencies["createSourceHost"]>>(
    async () => host
  );

  return {
    lines,
    rank,
    rankerConfigs,
    investigationConfigs,
    tracker,
    host,
    createSourceHost,
    deps: {
      print: (line) => lines.push(line),
      catalog: { getRepositories: async () => CATALOG },
      tracker,
      createRanker: (config) => {
        rankerConfigs.push(config);
        return { rank };
      },
      createOrchestrator: (config) => {
        investigationConfigs.push(config);
        return runner;
      },
      createSourceHost,
      chat: null,
    },
  };
}

const config = makeConfig({ CATALOG_TEAM: "payments", GITHUB_TOKEN: "test-secret" });

describe("parseCliArgs", () => {
  it("defaults to the repos command", () => {
    expect(parseCliArgs([]).command).toBe("repos");
  });

  it("reads a bare issue key", () => {
    expect(parseCliArgs(["triage", "SHOP-1"])).toMatchObject({
      command: "triage",
      key: "SHOP-1",
      summary: null,
      priority: "P3",
    });
  });

  it("reads investigate flags", () => {
    const args = parseCliArgs([
      "investigate",
      "--summary=Checkout broken",
      "--components",
      "payments, cart",
      "--provider",
      "Claude",
      "--agent-model",
      "test-model",
      "--budget",
      "1.5",
      "--local",
      "--report",
      "--no-dry-run",
    ]);

    expect(args).toMatchObject({
      command: "investigate",
      key: null,
      summary: "Checkout broken",
      components: ["payments", "cart"],
      provider: "claude",
      agentModel: "test-model",
      budget: 1.5,
      local: true,
      report: true,
      dryRun: false,
    });
  });

  it.each([
    [["triage"], "Provide an issue key or --summary."],
    [["deploy"], "Unknown command: deploy"],
    [["triage", "--summary"], "--summary requires a value."],
    [["triage", "--report", "--summary", "x"], "Unknown option for triage: --report"],
    [["investigate", "--summary", "x", "--budget", "0"], '--budget must be a positive number, got "0".'],
    [["triage", "--summary", "x", "--provider", "gemini"], '--provider must be claude or codex, got "gemini".'],
    [["triage", "SHOP-1", "SHOP-2"], "Unexpected argument: SHOP-2"],
  ])("rejects %j", (argv, message) => {
    expect(() => parseCliArgs(argv)).toThrow(UsageError);
    expect(() => parseCliArgs(argv)).toThrow(message);
  });
});

describe("runCli repos", () => {
  it("lists the filtered repositories by name", async () => {
    const h = harness();

    await runCli(["repos"], config, h.deps);

    expect(h.lines).toEqual([
      "Found 2 repositories (team=payments):",
      "",
      `  ${"checkout".padEnd(40)} example-org/checkout`,
      `  ${"search".padEnd(40)} example-org/search`,
    ]);
  });
});

describe("runCli triage", () => {
  it("fetches the bug from the tracker and prints the ranking", async () => {
    const h = harness();

    await runCli(["triage", "SHOP-1234", "--provider", "claude", "--model", "test-model"], config, h.deps);

    expect(h.tracker.getIssue).toHaveBeenCalledWith("SHOP-1234");
    expect(h.rankerConfigs[0]).toMatchObject({ provider: "claude", model: "test-model" });
    expect(h.rank.mock.calls[0][1].map((repo) => repo.name)).toEqual(["search", "checkout"]);
    expect(h.lines).toEqual([
      "Triaging SHOP-1234: Checkout fails with 500 on saved cards",
      "  Customers with a saved card get an error at the payment step.",
      "Against 2 repositories...",
      "",
      "  90%  checkout",
      "       payment path",
      "  40%  search",
    ]);
  });

  it("builds the bug from flags and reports an empty ranking", async () => {
    const h = harness([]);

    await runCli(["triage", "--summary", "Search is slow", "--local"], config, h.deps);

    expect(h.tracker.getIssue).not.toHaveBeenCalled();
    expect(h.rank.mock.calls[0][0]).toEqual({
      key: "BUG-0000",
      summary: "Search is slow",
      description: "",
      labels: [],
      priority: "P3",
      components: [],
    });
    expect(h.rankerConfigs[0].useSubprocess).toBe(true);
    expect(h.lines.at(-1)).toBe("No relevant repositories identified.");
  });
});

describe("runCli investigate", () => {
  it("prints the best verdict and the recommended action", async () => {
    const h = harness();

    await runCli(
      ["investigate", "SHOP-1234", "--agent-model", "test-model", "--budget", "1.5"],
      config,
      h.deps
    );

    expect(h.investigationConfigs[0]).toMatchObject({ model: "test-model", maxBudgetUsd: 1.5 });
    expect(h.lines).toEqual([
      "Triaging SHOP-1234: Checkout fails with 500 on saved cards",
      "Triage identified 2 repositories:",
      "  90%  checkout",
      "  40%  search",
      "",
      "Investigating...",
      "",
      "Best result: checkout (confidence: 90%)",
      "  Root cause: Null card token",
      "  Evidence:",
      "    - handler.ts:42",
      "  Proposed fix: Guard the token",
      "    - src/handler.ts",
      "",
      "Recommended action: pr",
    ]);
  });

  it("reports no findings", async () => {
    const h = harness(RANKING, []);

    await runCli(["investigate", "--summary", "Search is slow"], config, h.deps);

    expect(h.lines.slice(-3)).toEqual(["No findings.", "", "Recommended action: comment_summary"]);
  });

  it("stops after an empty triage", async () => {
    const h = harness([]);

    await runCli(["investigate", "--summary", "Search is slow"], config, h.deps);

    expect(h.lines.at(-1)).toBe("No relevant repositories identified.");
    expect(h.investigationConfigs).toEqual([]);
  });

  it("prints the tracker payload on a dry run", async () => {
    const h = harness();

    await runCli(["investigate", "SHOP-1234", "--report"], config, h.deps);

    const findings = aggregateFindings(makeBug(), [VERDICT]);
    expect(h.lines.slice(-5)).toEqual([
      "",
      "[DRY RUN] Tracker comment payload:",
      JSON.stringify(formatJiraComment(findings, null), null, 2),
      "",
      "[DRY RUN] Skipping PR creation, tracker comment and chat notification.",
    ]);
    expect(h.tracker.addComment).not.toHaveBeenCalled();
    expect(h.host.createBranch).not.toHaveBeenCalled();
  });

  it("opens the pull request and comments when not a dry run", async () => {
    const h = harness();

    await runCli(["investigate", "SHOP-1234", "--report", "--no-dry-run"], config, h.deps);

    expect(h.createSourceHost).toHaveBeenCalledWith("test-secret");
    expect(h.host.createPullRequest).toHaveBeenCalledTimes(1);
    expect(h.tracker.addComment).toHaveBeenCalledTimes(1);
    expect(h.lines.at(-1)).toBe(`PR created: ${PR_URL}`);
  });

  it("asks for the gh CLI login when no token is configured", async () => {
    const h = harness();

    await runCli(
      ["investigate", "SHOP-1234", "--report", "--no-dry-run"],
      makeConfig({ CATALOG_TEAM: "payments" }),
      h.deps
    );

    expect(h.createSourceHost).toHaveBeenCalledWith(undefined);
    expect(h.lines.at(-1)).toBe(`PR created: ${PR_URL}`);
  });

  it("still comments when no GitHub credentials are available", async () => {
    const h = harness();
    h.createSourceHost.mockRejectedValue(new Error("Failed to get GitHub token."));

    await runCli(
      ["investigate", "SHOP-1234", "--report", "--no-dry-run"],
      makeConfig({ CATALOG_TEAM: "payments" }),
      h.deps
    );

    expect(h.tracker.addComment).toHaveBeenCalledTimes(1);
    expect(h.lines.at(-1)).toBe("Findings reported (no PR created).");
  });
});
