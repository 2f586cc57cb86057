import { vi } from "vitest";

import type { CommandResult, CommandRunner, RunCommandOptions } from "../commandRunner.js";
import { loadConfig } from "../config.js";
import {
  createInvestigationResult,
  type InvestigationResultInput,
} from "../models.js";
import type {
  BugReport,
  ChatNotifier,
  Config,
  IssueTracker,
  Repository,
  SourceHost,
} from "../types.js";

export const PR_URL = "https://github.com/example-org/checkout/pull/7";

export function makeBug(overrides: Partial<BugReport> = {}): BugReport {
  return {
    key: "SHOP-1234",
    summary: "Checkout fails with 500 on saved cards",
    description: "Customers with a saved card get an error at the payment step.",
    labels: ["checkout"],
    priority: "P2",
    components: ["payments"],
    url: "https://jira.example.com/browse/SHOP-1234",
    ...overrides,
  };
}

export function makeRepo(name: string, overrides: Partial<Repository> = {}): Repository {
  return {
    name,
    githubSlug: `example-org/${name}`,
    lifecycle: "production",
    owner: "group:payments-team",
    tags: [],
    ...overrides,
  };
}

export function makeResult(overrides: InvestigationResultInput) {
  return createInvestigationResult(overrides);
}

export function makeConfig(env: Record<string, string> = {}): Config {
  return loadConfig(env);
}

export interface RecordedCall {
  command: string;
  args: string[];
  options: RunCommandOptions | undefined;
}

// In-process stand-in for child processes.
export function fakeRunner(
  respond: (call: RecordedCall) => CommandResult | Promise<CommandResult>
): { runner: CommandRunner; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const runner: CommandRunner = async (command, args, options) => {
    const call = { command, args, options };
    calls.push(call);
    return respond(call);
  };
  return { runner, calls };
}

export function ok(stdout: string): CommandResult {
  return { exitCode: 0, stdout, stderr: "" };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

// src/handler.ts exists on every branch; any other path is a new file.
export function fakeSourceHost() {
  return {
    getDefaultBranch: vi.fn<SourceHost["getDefaultBranch"]>(async () => "main"),
    getBranchSha: vi.fn<SourceHost["getBranchSha"]>(async () => "base-sha"),
    createBranch: vi.fn<SourceHost["createBranch"]>(async () => {}),
    getFileContent: vi.fn<SourceHost["getFileContent"]>(async (_owner, _repo, path) => {
      if (path === "src/handler.ts") return { content: "old", sha: "old-sha" };
      throw new Error("Not Found");
    }),
    updateFile: vi.fn<SourceHost["updateFile"]>(async () => {}),
    createPullRequest: vi.fn<SourceHost["createPullRequest"]>(async () => ({
      number: 7,
      htmlUrl: PR_URL,
    })),
  } satisfies SourceHost;
}

export function fakeTracker() {
  return {
    getIssue: vi.fn<IssueTracker["getIssue"]>(async () => makeBug()),
    addComment: vi.fn<IssueTracker["addComment"]>(async () => {}),
  } satisfies IssueTracker;
}

export function fakeChat() {
  return {
    postMessage: vi.fn<ChatNotifier["postMessage"]>(async () => {}),
  } satisfies ChatNotifier;
}
