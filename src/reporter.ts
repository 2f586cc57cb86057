// Reporting step for Bug Sleuth.
// Turns aggregated findings into side effects: a fix pull request on the
// source host (action "pr" only), a comment on the tracker issue, and a
// chat notification. Each side effect is attempted independently; a
// failing collaborator is logged and the others still run.
// Limitations: Each file change is written as the full new file content
//   through the contents API; no patch is applied.

import { errorMessage } from "./errors.js";
import { buildAdfDocument } from "./jiraClient.js";
import { logger } from "./logger.js";
import { hasUsableFix } from "./models.js";
import type {
  ActionType,
  AdfDocument,
  AggregatedFindings,
  ChatNotifier,
  IssueTracker,
  Repository,
  SlackBlock,
  SourceHost,
} from "./types.js";

const PR_TITLE_PREFIX = "[Bug Sleuth]";
const PR_TITLE_MAX_LENGTH = 72;
const SLACK_ROOT_CAUSE_MAX_LENGTH = 200;
const BRANCH_PREFIX = "bug-sleuth";

const ACTION_HEADLINES: Record<ActionType, string> = {
  pr: "Bug Sleuth: Fix Proposed",
  comment_root_cause: "Bug Sleuth: Root Cause Identified",
  comment_uncertain: "Bug Sleuth: Possible Root Cause",
  comment_summary: "Bug Sleuth: Investigation Summary",
};

export function formatPercent(confidence: number): string {
  return `${Math.round(confidence * 100)}%`;
}

function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}

function bullets(items: readonly string[]): string {
  return items.map((item) => `- ${item}`).join("\n");
}

// ============================================================
// Pull request
// ============================================================

export function formatPrTitle(findings: AggregatedFindings): string {
  const title = `${PR_TITLE_PREFIX} ${findings.bug.key}: ${findings.bug.summary}`;
  if (title.length <= PR_TITLE_MAX_LENGTH) return title;
  return `${title.slice(0, PR_TITLE_MAX_LENGTH - 3)}...`;
}

export function formatPrBody(findings: AggregatedFindings): string {
  const { bug, bestResult } = findings;
  const bugRef = bug.url ? `[${bug.key}](${bug.url})` : bug.key;
  const lines = ["## Bug", "", `${bugRef}: ${bug.summary}`, ""];

  if (bestResult) {
    lines.push(
      "## Root Cause",
      "",
      bestResult.rootCause || "Not determined.",
      "",
      `**Confidence:** ${formatPercent(bestResult.confidence)}`,
      ""
    );

    if (bestResult.evidence.length > 0) {
      lines.push("## Evidence", "", bullets(bestResult.evidence), "");
    }

    const fix = bestResult.proposedFix;
    if (hasUsableFix(fix)) {
      lines.push("## Fix", "");
      if (fix.description) lines.push(fix.description, "");
      lines.push(bullets(fix.filesChanged.map((change) => `\`${change.path}\``)), "");
    }
  }

  lines.push(
    "---",
    "",
    "_This pull request was auto-generated by Bug Sleuth. Review the changes before merging._"
  );
  return lines.join("\n");
}

/**
 * Opens a pull request carrying the best verdict's proposed fix.
 * Returns null when there is nothing to open: no verdict, no usable fix,
 * or no clone address for the verdict's repository. Source host errors
 * propagate.
 */
export async function createPrFromFindings(
  findings: AggregatedFindings,
  repos: readonly Repository[],
  sourceHost: SourceHost
): Promise<string | null> {
  const best = findings.bestResult;
  if (!best) return null;

  const fix = best.proposedFix;
  if (!hasUsableFix(fix)) {
    logger.info("No usable fix to open a pull request for.", { repo: best.repo });
    return null;
  }

  const slug = repos.find((repo) => repo.name === best.repo)?.githubSlug;
  const [owner, repo, ...rest] = (slug ?? "").split("/");
  if (!owner || !repo || rest.length > 0) {
    logger.warn("Repository has no usable slug; skipping pull request.", {
      repo: best.repo,
      slug: slug ?? null,
    });
    return null;
  }

  const key = findings.bug.key;
  const branch = `${BRANCH_PREFIX}/${key.toLowerCase()}`;

  const base = await sourceHost.getDefaultBranch(owner, repo);
  const baseSha = await sourceHost.getBranchSha(owner, repo, base);
  await sourceHost.createBranch(owner, repo, branch, baseSha);
  logger.info("Created fix branch.", { slug, branch, base });

  for (const change of fix.filesChanged) {
    let priorSha: string | null = null;
    try {
      priorSha = (await sourceHost.getFileContent(owner, repo, change.path, branch)).sha;
    } catch (error) {
      logger.debug("File not found on branch; creating it.", {
        path: change.path,
        error: errorMessage(error),
      });
    }

    await sourceHost.updateFile({
      owner,
      repo,
      path: change.path,
      content: change.diff,
      message: `${key}: update ${change.path}`,
      branch,
      sha: priorSha,
    });
  }

  const pr = await sourceHost.createPullRequest({
    owner,
    repo,
    title: formatPrTitle(findings),
    body: formatPrBody(findings),
    head: branch,
    base,
  });
  logger.info("Opened pull request.", { slug, number: pr.number, url: pr.htmlUrl });
  return pr.htmlUrl;
}

// ============================================================
// Tracker comment
// ============================================================

export function formatJiraComment(
  findings: AggregatedFindings,
  prUrl: string | null = null
): AdfDocument {
  const { action, bestResult } = findings;
  const sections: Array<[string, string]> = [];

  if (bestResult) {
    sections.push([
      ACTION_HEADLINES[action.type],
      `Repository: ${bestResult.repo} (confidence ${formatPercent(bestResult.confidence)})`,
    ]);
    sections.push(["Root Cause", bestResult.rootCause || "Not determined."]);
    if (bestResult.evidence.length > 0) {
      sections.push(["Evidence", bullets(bestResult.evidence)]);
    }
    if (bestResult.suspectCommits.length > 0) {
      sections.push(["Suspect Commits", bullets(bestResult.suspectCommits)]);
    }
  } else {
    sections.push([
      ACTION_HEADLINES[action.type],
      "No repository investigation produced a verdict.",
    ]);
  }

  if (prUrl) {
    sections.push(["Pull Request", prUrl]);
  }

  if (action.type !== "pr") {
    const steps = bestResult?.nextSteps ?? [];
    sections.push([
      "Suggested Next Steps",
      steps.length > 0 ? bullets(steps) : "Review the affected repositories manually.",
    ]);
  }

  return buildAdfDocument(sections);
}

// ============================================================
// Chat notification
// ============================================================

export function formatSlackMessage(
  findings: AggregatedFindings,
  prUrl: string | null = null
): { text: string; blocks: SlackBlock[] } {
  const { bug, action, bestResult } = findings;
  const text = `${ACTION_HEADLINES[action.type]} for ${bug.key}: ${bug.summary}`;

  const blocks: SlackBlock[] = [
    {
      type: "section",
      text: { type: "mrkdwn", text: `*${ACTION_HEADLINES[action.type]}*\n${bug.key}: ${bug.summary}` },
    },
    {
      type: "section",
      fields: [
        { type: "mrkdwn", text: `*Repository:*\n${bestResult?.repo ?? "none"}` },
        { type: "mrkdwn", text: `*Confidence:*\n${formatPercent(action.confidence)}` },
      ],
    },
  ];

  if (bestResult?.rootCause) {
    blocks.push({
      type: "section",
      text: {
        type: "mrkdwn",
        text: `*Root Cause:* ${truncate(bestResult.rootCause, SLACK_ROOT_CAUSE_MAX_LENGTH)}`,
      },
    });
  }

  const links = [bug.url ? `<${bug.url}|${bug.key}>` : null, prUrl ? `<${prUrl}|Pull request>` : null]
    .filter((link): link is string => link !== null);
  if (links.length > 0) {
    blocks.push({ type: "section", text: { type: "mrkdwn", text: links.join(" | ") } });
  }

  return { text, blocks };
}

// ============================================================
// Fan-out to collaborators
// ============================================================

export interface ReportTargets {
  tracker: IssueTracker;
  sourceHost?: SourceHost | null;
  chat?: ChatNotifier | null;
  chatChannel?: string;
}

/** Returns the pull request URL when one was opened. */
export async function reportFindings(
  findings: AggregatedFindings,
  repos: readonly Repository[],
  targets: ReportTargets
): Promise<string | null> {
  const key = findings.bug.key;
  let prUrl: string | null = null;

  if (findings.action.type === "pr" && targets.sourceHost) {
    try {
      prUrl = await createPrFromFindings(findings, repos, targets.sourceHost);
    } catch (error) {
      logger.error("Failed to create pull request.", { key, error: errorMessage(error) });
    }
  }

  try {
    await targets.tracker.addComment(key, formatJiraComment(findings, prUrl));
    logger.info("Posted tracker comment.", { key });
  } catch (error) {
    logger.error("Failed to post tracker comment.", { key, error: errorMessage(error) });
  }

  if (targets.chat && targets.chatChannel) {
    const { text, blocks } = formatSlackMessage(findings, prUrl);
    try {
      await targets.chat.postMessage(targets.chatChannel, text, blocks);
      logger.info("Posted chat notification.", { key, channel: targets.chatChannel });
    } catch (error) {
      logger.error("Failed to post chat notification.", { key, error: errorMessage(error) });
    }
  }

  return prUrl;
}
