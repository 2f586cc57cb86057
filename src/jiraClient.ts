// Jira REST client for Bug Sleuth.
// Fetches an issue as a BugReport and posts investigation comments in
// Atlassian Document Format (ADF). Authenticates with basic auth
// (account email + API token).
// Limitations: Only the fields used by the prompts are read; ADF
//   descriptions are flattened to plain text.

import { ServiceApiError } from "./errors.js";
import { logger } from "./logger.js";
import type {
  AdfDocument,
  AdfNode,
  BugReport,
  IssueTracker,
  JiraConfig,
} from "./types.js";

const ISSUE_FIELDS = "summary,description,labels,priority,reporter,components,created";
const DEFAULT_PRIORITY = "P3";

export class JiraClient implements IssueTracker {
  private config: JiraConfig;
  private fetchImpl: typeof fetch;

  constructor(config: JiraConfig, fetchImpl: typeof fetch = fetch) {
    this.config = config;
    this.fetchImpl = fetchImpl;
  }

  private headers(): Record<string, string> {
    const credentials = Buffer.from(
      `${this.config.email}:${this.config.apiToken}`
    ).toString("base64");
    return {
      Authorization: `Basic ${credentials}`,
      Accept: "application/json",
      "Content-Type": "application/json",
    };
  }

  async getIssue(key: string): Promise<BugReport> {
    logger.debug("Fetching issue.", { key });

    const url = `${this.config.baseUrl}/rest/api/3/issue/${encodeURIComponent(key)}?fields=${ISSUE_FIELDS}`;
    const response = await this.fetchImpl(url, { headers: this.headers() });
    if (response.status !== 200) {
      throw new ServiceApiError("JIRA", response.status, await response.text());
    }

    const data = asRecord(await response.json());
    const fields = asRecord(data.fields);
    const issueKey = typeof data.key === "string" ? data.key : key;

    return {
      key: issueKey,
      summary: typeof fields.summary === "string" ? fields.summary : "",
      description: extractDescription(fields.description),
      labels: Array.isArray(fields.labels)
        ? fields.labels.filter((label): label is string => typeof label === "string")
        : [],
      priority: extractPriority(fields.priority),
      components: extractComponents(fields.components),
      reporter: extractReporter(fields.reporter),
      created: typeof fields.created === "string" ? fields.created : undefined,
      url: `${this.config.baseUrl}/browse/${issueKey}`,
    };
  }

  async addComment(key: string, body: AdfDocument): Promise<void> {
    logger.debug("Posting issue comment.", { key });

    const response = await this.fetchImpl(
      `${this.config.baseUrl}/rest/api/3/issue/${encodeURIComponent(key)}/comment`,
      {
        method: "POST",
        headers: this.headers(),
        body: JSON.stringify({ body }),
      }
    );
    if (response.status !== 200 && response.status !== 201) {
      throw new ServiceApiError("JIRA", response.status, await response.text());
    }
  }
}

// ============================================================
// ADF helpers
// ============================================================

export function buildAdfDocument(
  sections: ReadonlyArray<readonly [heading: string, body: string]>
): AdfDocument {
  const content: AdfNode[] = [];
  for (const [heading, body] of sections) {
    content.push({
      type: "heading",
      attrs: { level: 3 },
      content: [{ type: "text", text: heading }],
    });
    if (body) {
      content.push({
        type: "paragraph",
        content: [{ type: "text", text: body }],
      });
    }
  }
  return { type: "doc", version: 1, content };
}

export function adfToText(node: unknown): string {
  const record = asRecord(node);
  if (record.type === "text") {
    return typeof record.text === "string" ? record.text : "";
  }
  const children = Array.isArray(record.content) ? record.content : [];
  return children
    .map((child) => adfToText(child))
    .join(" ")
    .trim();
}

function extractDescription(description: unknown): string {
  if (typeof description === "string") return description;
  if (description && typeof description === "object") return adfToText(description);
  return "";
}

function extractPriority(priority: unknown): string {
  const name = asRecord(priority).name;
  return typeof name === "string" && name ? name : DEFAULT_PRIORITY;
}

function extractReporter(reporter: unknown): string | undefined {
  const record = asRecord(reporter);
  if (typeof record.displayName === "string" && record.displayName) {
    return record.displayName;
  }
  if (typeof record.emailAddress === "string" && record.emailAddress) {
    return record.emailAddress;
  }
  return undefined;
}

function extractComponents(components: unknown): string[] {
  if (!Array.isArray(components)) return [];
  const names: string[] = [];
  for (const component of components) {
    const name = asRecord(component).name;
    if (typeof name === "string") names.push(name);
  }
  return names;
}

function asRecord(value: unknown): Record<string, unknown> {
  if (typeof value === "object" && value !== null && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}
