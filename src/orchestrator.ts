// Fan-out orchestration of repository investigations.
// Takes every ranked triage candidate, highest confidence first,
// resolves each to a clone address through the catalog, and runs clone + investigate as one unit
// per candidate with at most maxParallelAgents units in flight. Each
// unit removes its workspace when it ends; a failing unit contributes no
// result and does not affect its siblings.
// Limitations: Units are not retried.

import { mapLimit } from "./concurrency.js";
import { errorMessage } from "./errors.js";
import { Investigator, type RepositoryInvestigator } from "./investigator.js";
import { logger } from "./logger.js";
import { byConfidenceDesc } from "./models.js";
import { cloneRepository, type ClonedWorkspace } from "./repoCloner.js";
import type {
  BugReport,
  InvestigationConfig,
  InvestigationResult,
  Repository,
  TriageResult,
} from "./types.js";

export type CloneFn = (slug: string) => Promise<ClonedWorkspace>;

export interface OrchestratorDependencies {
  clone?: CloneFn;
  investigator?: RepositoryInvestigator;
}

interface InvestigationUnit {
  repoName: string;
  slug: string;
}

export class InvestigationOrchestrator {
  private config: InvestigationConfig;
  private clone: CloneFn;
  private investigator: RepositoryInvestigator;

  constructor(config: InvestigationConfig, deps: OrchestratorDependencies = {}) {
    this.config = config;
    this.clone =
      deps.clone ??
      ((slug) =>
        cloneRepository(slug, {
          depth: config.cloneDepth,
          timeoutSeconds: config.cloneTimeoutSeconds,
          protocol: config.cloneProtocol,
          token: config.githubToken,
        }));
    this.investigator = deps.investigator ?? new Investigator(config);
  }

  async investigateAll(
    bug: BugReport,
    ranked: readonly TriageResult[],
    catalog: readonly Repository[]
  ): Promise<InvestigationResult[]> {
    const slugByName = new Map<string, string>();
    for (const repo of catalog) {
      if (repo.githubSlug) slugByName.set(repo.name, repo.githubSlug);
    }

    const units: InvestigationUnit[] = [];
    for (const candidate of [...ranked].sort(byConfidenceDesc)) {
      const slug = slugByName.get(candidate.repo);
      if (!slug) {
        logger.warn(`No clone address for ${candidate.repo}, skipping.`, {
          repo: candidate.repo,
        });
        continue;
      }
      units.push({ repoName: candidate.repo, slug });
    }

    if (units.length === 0) {
      return [];
    }

    logger.info(`Investigating ${units.length} repositor${units.length === 1 ? "y" : "ies"}.`, {
      bug: bug.key,
      repos: units.map((unit) => unit.repoName),
      maxParallelAgents: this.config.maxParallelAgents,
    });

    const outcomes = await mapLimit(units, this.config.maxParallelAgents, (unit) =>
      this.runUnit(bug, unit)
    );

    return outcomes
      .filter((result): result is InvestigationResult => result !== null)
      .sort(byConfidenceDesc);
  }

  private async runUnit(
    bug: BugReport,
    unit: InvestigationUnit
  ): Promise<InvestigationResult | null> {
    let workspace: ClonedWorkspace | null = null;
    try {
      workspace = await this.clone(unit.slug);
      return await this.investigator.investigate(bug, unit.repoName, workspace.dir);
    } catch (error) {
      logger.error(`Investigation of ${unit.repoName} failed.`, {
        slug: unit.slug,
        error: errorMessage(error),
      });
      return null;
    } finally {
      if (workspace) {
        await workspace.dispose();
      }
    }
  }
}
