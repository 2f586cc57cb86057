import { describe, expect, it } from "vitest";

import { hasUsableFix } from "../models.js";
import {
  extractJson,
  parseInvestigationResponse,
  parseTriageResponse,
  unwrapEnvelope,
} from "../responseParser.js";

const RANKING = '[{"repo":"checkout","confidence":0.9,"reasoning":"payment path"}]';

describe("extractJson", () => {
  it("prefers a tagged fence over brackets in the surrounding prose", () => {
    const text = 'Candidates [see below]:\n```json\n[{"repo":"a"}]\n```\nDone [ok].';
    expect(extractJson(text, "array")).toBe('[{"repo":"a"}]');
  });

  it("accepts an untagged fence", () => {
    const text = 'Here:\n```\n{"confidence": 0.4}\n```';
    expect(extractJson(text, "object")).toBe('{"confidence": 0.4}');
  });

  it("skips a fence that does not hold the expected shape", () => {
    const text = "```bash\ngit log -3\n```\nthen\n```json\n{\"ok\": true}\n```";
    expect(extractJson(text, "object")).toBe('{"ok": true}');
  });

  it("falls back to the first-to-last bracket span", () => {
    expect(extractJson('Answer: {"a": {"b": 1}} end', "object")).toBe('{"a": {"b": 1}}');
  });

  it("returns null when no bracket span exists", () => {
    expect(extractJson("not json at all", "object")).toBeNull();
    expect(extractJson("] backwards [", "array")).toBeNull();
  });
});

describe("unwrapEnvelope", () => {
  it("returns the result field of a JSON envelope", () => {
    expect(unwrapEnvelope(JSON.stringify({ type: "result", result: RANKING }))).toBe(RANKING);
  });

  it("leaves non-envelope text unchanged", () => {
    expect(unwrapEnvelope(RANKING)).toBe(RANKING);
    expect(unwrapEnvelope('{"confidence": 0.4}')).toBe('{"confidence": 0.4}');
    expect(unwrapEnvelope("{not json")).toBe("{not json");
  });
});

describe("parseTriageResponse", () => {
  it("parses a bare array", () => {
    expect(parseTriageResponse(RANKING)).toEqual([
      { repo: "checkout", confidence: 0.9, reasoning: "payment path" },
    ]);
  });

  it("gives the same result with and without a json fence", () => {
    const text =
      '[{"repo":"a","confidence":0.95},{"repo":"b","confidence":0.4,"reasoning":"maybe"}]';
    expect(parseTriageResponse("```json\n" + text + "\n```")).toEqual(parseTriageResponse(text));
  });

  it("skips malformed entries and keeps the rest", () => {
    const text = JSON.stringify([
      { repo: "a", confidence: 0.8 },
      { repo: "missing-confidence" },
      { confidence: 0.7 },
      { repo: "out-of-range", confidence: 1.4 },
      { repo: "wrong-type", confidence: "high" },
      "not an object",
      { repo: "d", confidence: 0.1 },
    ]);
    expect(parseTriageResponse(text).map((result) => result.repo)).toEqual(["a", "d"]);
  });

  it("reads a numeric string confidence the same way as a verdict does", () => {
    const text = '[{"repo":"a","confidence":"0.8"},{"repo":"b","confidence":" "}]';

    expect(parseTriageResponse(text)).toEqual([
      { repo: "a", confidence: 0.8, reasoning: "" },
    ]);
  });

  it("keeps the input order", () => {
    const text = '[{"repo":"low","confidence":0.2},{"repo":"high","confidence":0.9}]';
    expect(parseTriageResponse(text).map((result) => result.repo)).toEqual(["low", "high"]);
  });

  it.each([
    ["no json", "I could not decide."],
    ["malformed json", "[{repo: a}]"],
    ["an object instead of an array", '{"repo":"a","confidence":0.5}'],
  ])("returns an empty list for %s", (_label, text) => {
    expect(parseTriageResponse(text)).toEqual([]);
  });
});

describe("parseInvestigationResponse", () => {
  it("maps a complete verdict", () => {
    const text = [
      "I looked at the history.",
      "```json",
      JSON.stringify({
        root_cause_found: true,
        confidence: 0.85,
        root_cause: "Null card token",
        evidence: ["handler.ts:42 dereferences token"],
        recent_suspect_commits: ["abc123"],
        proposed_fix: {
          description: "Guard the token",
          files_changed: [{ path: "src/handler.ts", diff: "+ if (!token) return;" }],
        },
        next_steps: ["Add a regression test"],
      }),
      "```",
    ].join("\n");

    expect(parseInvestigationResponse(text, "checkout")).toEqual({
      repo: "checkout",
      rootCauseFound: true,
      confidence: 0.85,
      rootCause: "Null card token",
      evidence: ["handler.ts:42 dereferences token"],
      suspectCommits: ["abc123"],
      proposedFix: {
        description: "Guard the token",
        filesChanged: [{ path: "src/handler.ts", diff: "+ if (!token) return;" }],
      },
      nextSteps: ["Add a regression test"],
    });
  });

  it("returns null for text without JSON", () => {
    expect(parseInvestigationResponse("not json at all", "checkout")).toBeNull();
  });

  it("returns null for an array where an object is expected", () => {
    expect(parseInvestigationResponse("[1, 2]", "checkout")).toBeNull();
  });

  it("rejects the whole verdict when confidence is out of range", () => {
    const text = JSON.stringify({ root_cause_found: true, confidence: 1.5, root_cause: "x" });
    expect(parseInvestigationResponse(text, "checkout")).toBeNull();
  });

  it("rejects a non-numeric confidence", () => {
    expect(parseInvestigationResponse('{"confidence": "very"}', "checkout")).toBeNull();
  });

  it("defaults missing fields", () => {
    expect(parseInvestigationResponse("{}", "checkout")).toEqual({
      repo: "checkout",
      rootCauseFound: false,
      confidence: 0,
      rootCause: "",
      evidence: [],
      suspectCommits: [],
      proposedFix: null,
      nextSteps: [],
    });
  });

  it("coerces loosely typed fields", () => {
    const text = JSON.stringify({
      root_cause_found: "true",
      confidence: "0.6",
      evidence: "single line of evidence",
      next_steps: [1, null, "check logs"],
    });
    const result = parseInvestigationResponse(text, "checkout");
    expect(result?.rootCauseFound).toBe(true);
    expect(result?.confidence).toBe(0.6);
    expect(result?.evidence).toEqual(["single line of evidence"]);
    expect(result?.nextSteps).toEqual(["1", "check logs"]);
  });

  it("drops file changes without a path and keeps the rest", () => {
    const text = JSON.stringify({
      confidence: 0.9,
      proposed_fix: {
        description: "Guard the token",
        files_changed: [{ diff: "orphan" }, { path: "src/a.ts" }, { path: "src/b.ts", diff: "+b" }],
      },
    });
    const result = parseInvestigationResponse(text, "checkout");
    expect(result?.proposedFix?.filesChanged).toEqual([
      { path: "src/a.ts", diff: "" },
      { path: "src/b.ts", diff: "+b" },
    ]);
    expect(hasUsableFix(result?.proposedFix ?? null)).toBe(true);
  });

  it("reports no usable fix when every file change lacks a path", () => {
    const text = JSON.stringify({
      confidence: 0.9,
      proposed_fix: { description: "unclear", files_changed: [{ diff: "orphan" }] },
    });
    const result = parseInvestigationResponse(text, "checkout");
    expect(result?.proposedFix).toEqual({ description: "unclear", filesChanged: [] });
    expect(hasUsableFix(result?.proposedFix ?? null)).toBe(false);
  });
});
