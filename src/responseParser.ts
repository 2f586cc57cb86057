// Parser for free-form agent answers.
// Locates one JSON value inside agent text (fenced block first, then a
// greedy bracket span) and turns it into validated triage rankings or an
// investigation verdict. Never throws: anything unusable becomes an
// empty list or null, logged with a bounded excerpt.
// Limitations: Only the first usable JSON value is considered; answers
//   that split their JSON across several blocks are not reassembled.

import {
  InvestigationResultSchema,
  TriageResultSchema,
  type FileChange,
  type InvestigationResult,
  type ProposedFix,
  type TriageResult,
} from "./models.js";
import { excerpt, logger } from "./logger.js";

export type JsonShape = "object" | "array";

const BRACKETS: Record<JsonShape, { open: string; close: string }> = {
  object: { open: "{", close: "}" },
  array: { open: "[", close: "]" },
};

// ```json ... ``` or ``` ... ```; the tag is optional.
const FENCE_PATTERN = /```(?:[\w-]+)?[^\S\n]*\n?([\s\S]*?)```/g;

// ============================================================
// Extraction
// ============================================================

export function extractJson(text: string, shape: JsonShape): string | null {
  const { open, close } = BRACKETS[shape];

  for (const match of text.matchAll(FENCE_PATTERN)) {
    const candidate = match[1].trim();
    if (candidate.startsWith(open)) {
      return candidate;
    }
  }

  const start = text.indexOf(open);
  const end = text.lastIndexOf(close);
  if (start === -1 || end <= start) {
    return null;
  }
  return text.slice(start, end + 1).trim();
}

// Some CLIs wrap their answer as {"result": "<text>"}.
export function unwrapEnvelope(raw: string): string {
  const trimmed = raw.trim();
  if (!trimmed.startsWith("{")) {
    return raw;
  }
  try {
    const envelope: unknown = JSON.parse(trimmed);
    if (isRecord(envelope) && typeof envelope.result === "string") {
      return envelope.result;
    }
  } catch {
    logger.debug("Agent output is not a JSON envelope; using it as-is.");
  }
  return raw;
}

function decode(raw: string, shape: JsonShape, label: string): unknown {
  const extracted = extractJson(raw, shape);
  if (extracted === null) {
    logger.warn(`No JSON ${shape} found in ${label} response.`, {
      excerpt: excerpt(raw),
    });
    return undefined;
  }
  try {
    return JSON.parse(extracted);
  } catch (error) {
    logger.warn(`Failed to parse ${label} JSON.`, {
      error: error instanceof Error ? error.message : String(error),
      excerpt: excerpt(extracted),
    });
    return undefined;
  }
}

// ============================================================
// Triage rankings
// ============================================================

// Unsorted and uncapped; selection happens in the ranker.
export function parseTriageResponse(raw: string): TriageResult[] {
  const data = decode(raw, "array", "triage");
  if (data === undefined) {
    return [];
  }
  if (!Array.isArray(data)) {
    logger.warn("Triage response is not a JSON array.", {
      excerpt: excerpt(raw),
    });
    return [];
  }

  const results: TriageResult[] = [];
  let skipped = 0;
  for (const item of data) {
    if (!isRecord(item) || !("repo" in item) || !("confidence" in item)) {
      skipped += 1;
      continue;
    }
    const parsed = TriageResultSchema.safeParse({
      ...item,
      confidence: toNumber(item.confidence),
    });
    if (parsed.success) {
      results.push(parsed.data);
    } else {
      skipped += 1;
    }
  }

  if (skipped > 0) {
    logger.debug(`Skipped ${skipped} malformed triage entr${skipped === 1 ? "y" : "ies"}.`);
  }
  return results;
}

// ============================================================
// Investigation verdict
// ============================================================

export function parseInvestigationResponse(
  raw: string,
  repoName: string
): InvestigationResult | null {
  const data = decode(raw, "object", "investigation");
  if (data === undefined) {
    return null;
  }
  if (!isRecord(data)) {
    logger.warn("Investigation response is not a JSON object.", {
      repo: repoName,
      excerpt: excerpt(raw),
    });
    return null;
  }

  const parsed = InvestigationResultSchema.safeParse({
    repo: repoName,
    rootCauseFound: toBoolean(data.root_cause_found),
    confidence: toNumber(data.confidence),
    rootCause: toText(data.root_cause),
    evidence: toStringList(data.evidence),
    suspectCommits: toStringList(data.recent_suspect_commits),
    proposedFix: parseProposedFix(data.proposed_fix),
    nextSteps: toStringList(data.next_steps),
  });

  if (!parsed.success) {
    logger.warn("Investigation verdict failed validation.", {
      repo: repoName,
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
    return null;
  }
  return parsed.data;
}

function parseProposedFix(value: unknown): ProposedFix | null {
  if (!isRecord(value)) {
    return null;
  }
  const entries = Array.isArray(value.files_changed) ? value.files_changed : [];
  const filesChanged: FileChange[] = [];
  for (const entry of entries) {
    if (!isRecord(entry) || typeof entry.path !== "string" || entry.path === "") {
      continue;
    }
    filesChanged.push({
      path: entry.path,
      diff: typeof entry.diff === "string" ? entry.diff : "",
    });
  }
  return { description: toText(value.description), filesChanged };
}

// ============================================================
// Coercion helpers
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toBoolean(value: unknown): boolean {
  if (typeof value === "boolean") return value;
  if (typeof value === "string") return value.trim().toLowerCase() === "true";
  if (typeof value === "number") return value !== 0;
  return false;
}

// Missing means 0.0; anything non-numeric becomes NaN and fails validation.
function toNumber(value: unknown): number {
  if (value === undefined || value === null) return 0;
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim() !== "") return Number(value);
  return Number.NaN;
}

function toText(value: unknown): string {
  if (value === undefined || value === null) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return JSON.stringify(value);
}

function toStringList(value: unknown): string[] {
  if (typeof value === "string") {
    return value.trim() === "" ? [] : [value];
  }
  if (!Array.isArray(value)) {
    return [];
  }
  return value
    .filter((item) => item !== null && item !== undefined)
    .map((item) => toText(item));
}
