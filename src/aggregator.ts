// Collapses investigation verdicts into one recommended action.

import { hasUsableFix } from "./models.js";
import type {
  Action,
  ActionType,
  AggregatedFindings,
  BugReport,
  InvestigationConfig,
  InvestigationResult,
} from "./types.js";

export type DecisionThresholds = Pick<
  InvestigationConfig,
  "highConfidenceThreshold" | "uncertainConfidenceThreshold"
>;

export const DEFAULT_THRESHOLDS: DecisionThresholds = {
  highConfidenceThreshold: 0.8,
  uncertainConfidenceThreshold: 0.5,
};

// Expects results sorted by confidence, highest first; the first one is
// taken as the best verdict. Both thresholds are inclusive.
export function aggregateFindings(
  bug: BugReport,
  results: readonly InvestigationResult[],
  thresholds: DecisionThresholds = DEFAULT_THRESHOLDS
): AggregatedFindings {
  const best = results.length > 0 ? results[0] : null;

  let action: Action;
  if (best === null) {
    action = { type: "comment_summary", confidence: 0, hasFix: false };
  } else {
    const hasFix = hasUsableFix(best.proposedFix);
    action = {
      type: decide(best.confidence, hasFix, thresholds),
      confidence: best.confidence,
      hasFix,
    };
  }

  return Object.freeze({
    bug,
    results: [...results],
    bestResult: best,
    action: Object.freeze(action),
  });
}

function decide(
  confidence: number,
  hasFix: boolean,
  thresholds: DecisionThresholds
): ActionType {
  if (confidence >= thresholds.highConfidenceThreshold) {
    return hasFix ? "pr" : "comment_root_cause";
  }
  if (confidence >= thresholds.uncertainConfidenceThreshold) {
    return "comment_uncertain";
  }
  return "comment_summary";
}
