// Data models and type definitions for Bug Sleuth.
// Defines shared interfaces for configuration, bug reports, catalog
// repositories, the aggregated decision, and the collaborator
// boundaries (tracker, chat, source host) used by the reporting step.
// Agent verdict records are validated with zod and live in models.ts.
// Limitations: BugReport mirrors the subset of tracker fields the
//   prompts use; custom tracker fields are not carried.

import type { InvestigationResult } from "./models.js";

export type {
  FileChange,
  InvestigationResult,
  ProposedFix,
  TriageResult,
} from "./models.js";

// ============================================================
// Configuration
// ============================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export type CloneProtocol = "https" | "ssh";

export interface TriageConfig {
  // Raw provider identifier; resolved (and rejected) by the backend factory.
  provider: string;
  anthropicApiKey: string;
  model: string | null;
  maxRepos: number;
  minConfidence: number;
  useSubprocess: boolean;
  timeoutSeconds: number;
}

export interface InvestigationConfig {
  provider: string;
  model: string | null;
  maxBudgetUsd: number;
  cloneDepth: number;
  cloneTimeoutSeconds: number;
  cloneProtocol: CloneProtocol;
  agentTimeoutSeconds: number;
  maxParallelAgents: number;
  highConfidenceThreshold: number;
  uncertainConfidenceThreshold: number;
  githubToken: string;
}

export interface GitHubConfig {
  token: string;
}

export interface JiraConfig {
  baseUrl: string;
  email: string;
  apiToken: string;
}

export interface SlackConfig {
  botToken: string;
  channel: string;
}

export interface CatalogConfig {
  baseUrl: string;
  token: string;
  team: string;
  ownerGroup: string;
  defaultSlugs: string[];
  useLocalFile: boolean;
  localFilePath: string;
  cacheTtlSeconds: number;
}

export interface Config {
  logLevel: LogLevel;
  triage: TriageConfig;
  investigation: InvestigationConfig;
  github: GitHubConfig;
  jira: JiraConfig;
  slack: SlackConfig;
  catalog: CatalogConfig;
}

// ============================================================
// Bug report and candidate repositories
// ============================================================

export interface BugReport {
  readonly key: string;
  readonly summary: string;
  readonly description: string;
  readonly labels: readonly string[];
  readonly priority: string;
  readonly components: readonly string[];
  readonly reporter?: string;
  readonly created?: string;
  readonly url?: string;
}

export interface Repository {
  readonly name: string;
  readonly description?: string;
  // "owner/repo" on the source host; candidates without one cannot be cloned.
  readonly githubSlug?: string;
  readonly componentType?: string;
  readonly lifecycle?: string;
  readonly owner?: string;
  readonly system?: string;
  readonly tags: readonly string[];
}

// ============================================================
// Aggregated decision
// ============================================================

// pr = file a fix pull request; the comment_* variants only comment.
export type ActionType =
  | "pr"
  | "comment_root_cause"
  | "comment_uncertain"
  | "comment_summary";

export interface Action {
  readonly type: ActionType;
  readonly confidence: number;
  readonly hasFix: boolean;
}

export interface AggregatedFindings {
  readonly bug: BugReport;
  readonly results: readonly InvestigationResult[];
  readonly bestResult: InvestigationResult | null;
  readonly action: Action;
}

// ============================================================
// Collaborator boundaries
// ============================================================

// Atlassian Document Format, as posted to the tracker.
export interface AdfNode {
  type: string;
  text?: string;
  attrs?: Record<string, unknown>;
  content?: AdfNode[];
}

export interface AdfDocument {
  type: "doc";
  version: 1;
  content: AdfNode[];
}

export interface IssueTracker {
  getIssue(key: string): Promise<BugReport>;
  addComment(key: string, body: AdfDocument): Promise<void>;
}

export interface SlackBlock {
  type: string;
  text?: { type: "mrkdwn" | "plain_text"; text: string };
  fields?: Array<{ type: "mrkdwn" | "plain_text"; text: string }>;
}

export interface ChatNotifier {
  postMessage(
    channel: string,
    text: string,
    blocks?: SlackBlock[]
  ): Promise<void>;
}

export interface FileContent {
  content: string;
  sha: string;
}

export interface SourceHost {
  getDefaultBranch(owner: string, repo: string): Promise<string>;
  getBranchSha(owner: string, repo: string, branch: string): Promise<string>;
  createBranch(
    owner: string,
    repo: string,
    branch: string,
    fromSha: string
  ): Promise<void>;
  getFileContent(
    owner: string,
    repo: string,
    path: string,
    ref: string
  ): Promise<FileContent>;
  updateFile(params: {
    owner: string;
    repo: string;
    path: string;
    content: string;
    message: string;
    branch: string;
    sha: string | null;
  }): Promise<void>;
  createPullRequest(params: {
    owner: string;
    repo: string;
    title: string;
    body: string;
    head: string;
    base: string;
  }): Promise<{ number: number; htmlUrl: string }>;
}
