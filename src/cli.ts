// Command-line front end for Bug Sleuth.
// Three commands share one pipeline:
//   repos        list the filtered catalog repositories
//   triage       rank repositories for a bug
//   investigate  triage, clone, investigate, aggregate and optionally report
// A bug comes from the tracker when only a key is given, otherwise from
// the --summary/--description/--components/--priority flags.
// Limitations: --report defaults to a dry run that only prints the
//   tracker comment payload; --no-dry-run performs the side effects.

import { resolveProvider } from "./agentCli.js";
import { aggregateFindings } from "./aggregator.js";
import { CatalogClient, filterRepositories } from "./catalogClient.js";
import { parseCommaSeparated } from "./config.js";
import { UsageError, errorMessage } from "./errors.js";
import { GitHubClient } from "./githubClient.js";
import { JiraClient } from "./jiraClient.js";
import { logger } from "./logger.js";
import { InvestigationOrchestrator } from "./orchestrator.js";
import { formatJiraComment, formatPercent, reportFindings } from "./reporter.js";
import { SlackClient } from "./slackClient.js";
import { createTriageRanker, type TriageRanker } from "./triageRanker.js";
import type {
  BugReport,
  ChatNotifier,
  Config,
  InvestigationConfig,
  InvestigationResult,
  IssueTracker,
  Repository,
  SourceHost,
  TriageConfig,
  TriageResult,
} from "./types.js";

export const USAGE = `Usage:
  bug-sleuth repos
  bug-sleuth triage [KEY] [--summary S] [--description D] [--components a,b]
                    [--priority P] [--provider claude|codex] [--model M] [--local]
  bug-sleuth investigate [KEY] [--summary S] [--description D] [--components a,b]
                    [--priority P] [--provider claude|codex] [--triage-model M]
                    [--agent-model M] [--local] [--budget USD] [--report] [--no-dry-run]`;

const DEFAULT_BUG_KEY = "BUG-0000";
const DEFAULT_PRIORITY = "P3";
const DESCRIPTION_PREVIEW_LENGTH = 120;

export type CommandName = "repos" | "triage" | "investigate";

export interface CliArgs {
  command: CommandName;
  key: string | null;
  summary: string | null;
  description: string;
  components: string[];
  priority: string;
  provider: string | null;
  model: string | null;
  triageModel: string | null;
  agentModel: string | null;
  local: boolean;
  budget: number | null;
  report: boolean;
  dryRun: boolean;
}

// ============================================================
// Argument parsing
// ============================================================

const VALUE_FLAGS: Record<CommandName, readonly string[]> = {
  repos: [],
  triage: ["--summary", "--description", "--components", "--priority", "--provider", "--model"],
  investigate: [
    "--summary",
    "--description",
    "--components",
    "--priority",
    "--provider",
    "--triage-model",
    "--agent-model",
    "--budget",
  ],
};

const BOOLEAN_FLAGS: Record<CommandName, readonly string[]> = {
  repos: [],
  triage: ["--local"],
  investigate: ["--local", "--report", "--dry-run", "--no-dry-run"],
};

function isCommandName(value: string): value is CommandName {
  return value === "repos" || value === "triage" || value === "investigate";
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const [first, ...rest] = argv;
  const command = first ?? "repos";
  if (!isCommandName(command)) {
    throw new UsageError(`Unknown command: ${command}\n\n${USAGE}`);
  }

  const args: CliArgs = {
    command,
    key: null,
    summary: null,
    description: "",
    components: [],
    priority: DEFAULT_PRIORITY,
    provider: null,
    model: null,
    triageModel: null,
    agentModel: null,
    local: false,
    budget: null,
    report: false,
    dryRun: true,
  };

  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];

    if (!token.startsWith("--")) {
      if (command === "repos" || args.key !== null) {
        throw new UsageError(`Unexpected argument: ${token}\n\n${USAGE}`);
      }
      args.key = token;
      continue;
    }

    const eq = token.indexOf("=");
    const flag = eq === -1 ? token : token.slice(0, eq);

    if (BOOLEAN_FLAGS[command].includes(flag)) {
      if (eq !== -1) throw new UsageError(`${flag} does not take a value.`);
      if (flag === "--local") args.local = true;
      else if (flag === "--report") args.report = true;
      else args.dryRun = flag === "--dry-run";
      continue;
    }

    if (!VALUE_FLAGS[command].includes(flag)) {
      throw new UsageError(`Unknown option for ${command}: ${flag}\n\n${USAGE}`);
    }

    let value: string;
    if (eq !== -1) {
      value = token.slice(eq + 1);
    } else {
      const next = rest[i + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new UsageError(`${flag} requires a value.`);
      }
      value = next;
      i++;
    }
    applyValueFlag(args, flag, value);
  }

  if (command !== "repos" && !args.key && !args.summary) {
    throw new UsageError(`Provide an issue key or --summary.\n\n${USAGE}`);
  }
  return args;
}

function applyValueFlag(args: CliArgs, flag: string, value: string): void {
  switch (flag) {
    case "--summary":
      args.summary = value;
      return;
    case "--description":
      args.description = value;
      return;
    case "--components":
      args.components = parseCommaSeparated(value);
      return;
    case "--priority":
      args.priority = value;
      return;
    case "--provider": {
      const provider = value.trim().toLowerCase();
      if (provider !== "claude" && provider !== "codex") {
        throw new UsageError(`--provider must be claude or codex, got "${value}".`);
      }
      args.provider = provider;
      return;
    }
    case "--model":
      args.model = value;
      return;
    case "--triage-model":
      args.triageModel = value;
      return;
    case "--agent-model":
      args.agentModel = value;
      return;
    case "--budget": {
      const budget = Number(value);
      if (!Number.isFinite(budget) || budget <= 0) {
        throw new UsageError(`--budget must be a positive number, got "${value}".`);
      }
      args.budget = budget;
      return;
    }
    default:
      throw new UsageError(`Unknown option: ${flag}`);
  }
}

// ============================================================
// Collaborators
// ============================================================

export interface RepositorySource {
  getRepositories(): Promise<Repository[]>;
}

export interface InvestigationRunner {
  investigateAll(
    bug: BugReport,
    ranked: readonly TriageResult[],
    catalog: readonly Repository[]
  ): Promise<InvestigationResult[]>;
}

// Every collaborator can be replaced; unset ones are built from config.
export interface CliDependencies {
  print?: (line: string) => void;
  catalog?: RepositorySource;
  tracker?: IssueTracker;
  createRanker?: (config: TriageConfig) => TriageRanker;
  createOrchestrator?: (config: InvestigationConfig) => InvestigationRunner;
  createSourceHost?: (token: string | undefined) => Promise<SourceHost>;
  chat?: ChatNotifier | null;
}

class CliContext {
  readonly config: Config;
  readonly print: (line: string) => void;
  private deps: CliDependencies;
  private trackerInstance: IssueTracker | null = null;

  constructor(config: Config, deps: CliDependencies) {
    this.config = config;
    this.deps = deps;
    this.print = deps.print ?? ((line) => console.log(line));
  }

  get tracker(): IssueTracker {
    if (!this.trackerInstance) {
      this.trackerInstance = this.deps.tracker ?? new JiraClient(this.config.jira);
    }
    return this.trackerInstance;
  }

  async repositories(): Promise<Repository[]> {
    const catalog = this.deps.catalog ?? new CatalogClient(this.config.catalog);
    const repos = await catalog.getRepositories();
    return filterRepositories(repos, this.config.catalog);
  }

  ranker(config: TriageConfig): TriageRanker {
    return this.deps.createRanker ? this.deps.createRanker(config) : createTriageRanker(config);
  }

  orchestrator(config: InvestigationConfig): InvestigationRunner {
    return this.deps.createOrchestrator
      ? this.deps.createOrchestrator(config)
      : new InvestigationOrchestrator(config);
  }

  // Without a configured token the gh CLI login is tried.
  async sourceHost(): Promise<SourceHost | null> {
    const token = this.config.github.token || undefined;
    try {
      return this.deps.createSourceHost
        ? await this.deps.createSourceHost(token)
        : await GitHubClient.create(token);
    } catch (error) {
      logger.error("No GitHub credentials, pull request creation disabled.", {
        error: errorMessage(error),
      });
      return null;
    }
  }

  chat(): ChatNotifier | null {
    if (this.deps.chat !== undefined) return this.deps.chat;
    const slack = this.config.slack;
    return slack.botToken && slack.channel ? new SlackClient(slack) : null;
  }
}

// ============================================================
// Commands
// ============================================================

export async function runCli(
  argv: readonly string[],
  config: Config,
  deps: CliDependencies = {}
): Promise<void> {
  const args = parseCliArgs(argv);
  const ctx = new CliContext(config, deps);

  switch (args.command) {
    case "repos":
      await reposCommand(ctx);
      return;
    case "triage":
      await triageCommand(ctx, args);
      return;
    case "investigate":
      await investigateCommand(ctx, args);
      return;
  }
}

async function reposCommand(ctx: CliContext): Promise<void> {
  const repos = await ctx.repositories();
  const { team, defaultSlugs } = ctx.config.catalog;

  let scope = `team=${team}`;
  if (defaultSlugs.length > 0) {
    scope += `, slug_filters=${defaultSlugs.join(",")}`;
  }
  ctx.print(`Found ${repos.length} repositories (${scope}):`);
  ctx.print("");

  const sorted = [...repos].sort((a, b) => a.name.localeCompare(b.name));
  for (const repo of sorted) {
    ctx.print(`  ${repo.name.padEnd(40)} ${repo.githubSlug ?? "(no slug)"}`);
  }
}

async function fetchBug(ctx: CliContext, args: CliArgs): Promise<BugReport> {
  if (args.key && !args.summary) {
    logger.debug("Fetching bug from tracker.", { key: args.key });
    return ctx.tracker.getIssue(args.key);
  }
  return {
    key: args.key ?? DEFAULT_BUG_KEY,
    summary: args.summary ?? "",
    description: args.description,
    labels: [],
    priority: args.priority,
    components: args.components,
  };
}

function triageConfigFor(ctx: CliContext, args: CliArgs, model: string | null): TriageConfig {
  const base = ctx.config.triage;
  return {
    ...base,
    provider: args.provider ?? base.provider,
    model: model ?? base.model,
    useSubprocess: args.local || base.useSubprocess,
  };
}

async function triageCommand(ctx: CliContext, args: CliArgs): Promise<void> {
  const bug = await fetchBug(ctx, args);
  const ranker = ctx.ranker(triageConfigFor(ctx, args, args.model));
  const repos = await ctx.repositories();

  ctx.print(`Triaging ${bug.key}: ${bug.summary}`);
  if (bug.description) {
    const preview = bug.description.slice(0, DESCRIPTION_PREVIEW_LENGTH);
    const ellipsis = bug.description.length > DESCRIPTION_PREVIEW_LENGTH ? "..." : "";
    ctx.print(`  ${preview}${ellipsis}`);
  }
  ctx.print(`Against ${repos.length} repositories...`);
  ctx.print("");

  const results = await ranker.rank(bug, repos);
  if (results.length === 0) {
    ctx.print("No relevant repositories identified.");
    return;
  }

  for (const result of results) {
    ctx.print(`  ${formatPercent(result.confidence)}  ${result.repo}`);
    if (result.reasoning) {
      ctx.print(`       ${result.reasoning}`);
    }
  }
}

async function investigateCommand(ctx: CliContext, args: CliArgs): Promise<void> {
  const bug = await fetchBug(ctx, args);
  const triageConfig = triageConfigFor(ctx, args, args.triageModel);
  const ranker = ctx.ranker(triageConfig);

  const base = ctx.config.investigation;
  const investigationConfig: InvestigationConfig = {
    ...base,
    provider: args.provider ?? base.provider,
    model: args.agentModel ?? base.model,
    maxBudgetUsd: args.budget ?? base.maxBudgetUsd,
  };
  // Validate the provider before any network or clone work starts.
  resolveProvider(investigationConfig.provider);

  const repos = await ctx.repositories();

  ctx.print(`Triaging ${bug.key}: ${bug.summary}`);
  const ranked = await ranker.rank(bug, repos);
  if (ranked.length === 0) {
    ctx.print("No relevant repositories identified.");
    return;
  }

  ctx.print(`Triage identified ${ranked.length} repositories:`);
  for (const result of ranked) {
    ctx.print(`  ${formatPercent(result.confidence)}  ${result.repo}`);
  }
  ctx.print("");

  ctx.print("Investigating...");
  const results = await ctx.orchestrator(investigationConfig).investigateAll(bug, ranked, repos);
  const findings = aggregateFindings(bug, results, investigationConfig);

  ctx.print("");
  const best = findings.bestResult;
  if (!best) {
    ctx.print("No findings.");
  } else {
    ctx.print(`Best result: ${best.repo} (confidence: ${formatPercent(best.confidence)})`);
    if (best.rootCause) {
      ctx.print(`  Root cause: ${best.rootCause}`);
    }
    if (best.evidence.length > 0) {
      ctx.print("  Evidence:");
      for (const item of best.evidence) ctx.print(`    - ${item}`);
    }
    if (best.proposedFix && best.proposedFix.filesChanged.length > 0) {
      ctx.print(`  Proposed fix: ${best.proposedFix.description}`);
      for (const change of best.proposedFix.filesChanged) ctx.print(`    - ${change.path}`);
    }
  }
  ctx.print("");
  ctx.print(`Recommended action: ${findings.action.type}`);

  if (!args.report) return;

  if (args.dryRun) {
    ctx.print("");
    ctx.print("[DRY RUN] Tracker comment payload:");
    ctx.print(JSON.stringify(formatJiraComment(findings, null), null, 2));
    ctx.print("");
    ctx.print("[DRY RUN] Skipping PR creation, tracker comment and chat notification.");
    return;
  }

  const prUrl = await reportFindings(findings, repos, {
    tracker: ctx.tracker,
    sourceHost: await ctx.sourceHost(),
    chat: ctx.chat(),
    chatChannel: ctx.config.slack.channel,
  });
  ctx.print("");
  ctx.print(prUrl ? `PR created: ${prUrl}` : "Findings reported (no PR created).");
}
