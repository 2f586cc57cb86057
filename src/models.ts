// Validated records produced from agent output.
// Confidence is load-bearing for ranking and aggregation, so every
// record that carries one is built through a zod schema that rejects
// values outside [0, 1]. Built records are frozen.

import { z } from "zod";

const confidenceSchema = z
  .number()
  .finite()
  .min(0, "confidence must be between 0.0 and 1.0")
  .max(1, "confidence must be between 0.0 and 1.0");

export const TriageResultSchema = z
  .object({
    repo: z.string().min(1),
    confidence: confidenceSchema,
    reasoning: z.string().default(""),
  })
  .readonly();

export const FileChangeSchema = z
  .object({
    path: z.string().min(1),
    diff: z.string().default(""),
  })
  .readonly();

export const ProposedFixSchema = z
  .object({
    description: z.string().default(""),
    filesChanged: z.array(FileChangeSchema).readonly().default([]),
  })
  .readonly();

export const InvestigationResultSchema = z
  .object({
    repo: z.string().min(1),
    rootCauseFound: z.boolean().default(false),
    confidence: confidenceSchema.default(0),
    rootCause: z.string().default(""),
    evidence: z.array(z.string()).readonly().default([]),
    suspectCommits: z.array(z.string()).readonly().default([]),
    proposedFix: ProposedFixSchema.nullable().default(null),
    nextSteps: z.array(z.string()).readonly().default([]),
  })
  .readonly();

export type TriageResult = z.output<typeof TriageResultSchema>;
export type FileChange = z.output<typeof FileChangeSchema>;
export type ProposedFix = z.output<typeof ProposedFixSchema>;
export type InvestigationResult = z.output<typeof InvestigationResultSchema>;

export type TriageResultInput = z.input<typeof TriageResultSchema>;
export type InvestigationResultInput = z.input<typeof InvestigationResultSchema>;

/** Throws a ZodError when the input is invalid (e.g. confidence 1.5). */
export function createTriageResult(input: TriageResultInput): TriageResult {
  return TriageResultSchema.parse(input);
}

/** Throws a ZodError when the input is invalid (e.g. confidence -0.1). */
export function createInvestigationResult(
  input: InvestigationResultInput
): InvestigationResult {
  return InvestigationResultSchema.parse(input);
}

export function hasUsableFix(fix: ProposedFix | null): fix is ProposedFix {
  return fix !== null && fix.filesChanged.length > 0;
}

export function byConfidenceDesc(
  a: { confidence: number },
  b: { confidence: number }
): number {
  return b.confidence - a.confidence;
}
