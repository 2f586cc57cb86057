// Service catalog client for Bug Sleuth.
// Lists component entities owned by a group, either from the catalog
// REST API or from a local JSON export, maps them to Repository records
// and keeps only production-lifecycle entries. Results are cached per
// owner group for cacheTtlSeconds.
// Limitations: The cache lives in memory for the lifetime of the client.

import { readFile } from "fs/promises";
import { z } from "zod";

import { CatalogDataError, ServiceApiError, errorMessage } from "./errors.js";
import { logger } from "./logger.js";
import type { CatalogConfig, Repository } from "./types.js";

const SLUG_ANNOTATION = "github.com/project-slug";

const CatalogEntitySchema = z.object({
  metadata: z.object({
    name: z.string(),
    description: z.string().nullish(),
    annotations: z.record(z.string()).default({}),
    tags: z.array(z.string()).default([]),
  }),
  spec: z
    .object({
      type: z.string().nullish(),
      lifecycle: z.string().nullish(),
      owner: z.string().nullish(),
      system: z.string().nullish(),
      dependsOn: z.array(z.string()).default([]),
    })
    .default({}),
});

export type CatalogEntity = z.output<typeof CatalogEntitySchema>;

export function repositoryFromEntity(entity: CatalogEntity): Repository {
  return {
    name: entity.metadata.name,
    description: entity.metadata.description ?? undefined,
    githubSlug: entity.metadata.annotations[SLUG_ANNOTATION],
    componentType: entity.spec.type ?? undefined,
    lifecycle: entity.spec.lifecycle ?? undefined,
    owner: entity.spec.owner ?? undefined,
    system: entity.spec.system ?? undefined,
    tags: entity.metadata.tags,
  };
}

interface CacheEntry {
  repos: Repository[];
  storedAt: number;
}

export interface GetRepositoriesOptions {
  bypassCache?: boolean;
}

export class CatalogClient {
  private config: CatalogConfig;
  private fetchImpl: typeof fetch;
  private now: () => number;
  private cache = new Map<string, CacheEntry>();

  constructor(
    config: CatalogConfig,
    fetchImpl: typeof fetch = fetch,
    now: () => number = Date.now
  ) {
    this.config = config;
    this.fetchImpl = fetchImpl;
    this.now = now;
  }

  async getRepositories(
    ownerGroup?: string,
    options: GetRepositoriesOptions = {}
  ): Promise<Repository[]> {
    const owner = ownerGroup ?? this.config.ownerGroup;

    if (!options.bypassCache) {
      const entry = this.cache.get(owner);
      if (entry && this.now() - entry.storedAt < this.config.cacheTtlSeconds * 1000) {
        logger.debug("Catalog cache hit.", { owner });
        return entry.repos;
      }
    }

    const entities = this.config.useLocalFile
      ? await this.loadEntitiesFromFile()
      : await this.fetchEntities(owner);

    const all = entities.map(repositoryFromEntity);
    const production = all.filter(
      (repo) => (repo.lifecycle ?? "").toLowerCase() === "production"
    );
    const excluded = all.length - production.length;
    if (excluded > 0) {
      logger.info(`Filtered ${excluded} non-production entit${excluded === 1 ? "y" : "ies"}.`, {
        owner,
      });
    }

    this.cache.set(owner, { repos: production, storedAt: this.now() });
    return production;
  }

  private async loadEntitiesFromFile(): Promise<CatalogEntity[]> {
    const path = this.config.localFilePath;

    let text: string;
    try {
      text = await readFile(path, "utf-8");
    } catch (error) {
      throw new CatalogDataError(
        `Catalog local file not found: ${path} (${errorMessage(error)})`
      );
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new CatalogDataError(
        `Invalid JSON in catalog local file ${path}: ${errorMessage(error)}`
      );
    }

    if (!Array.isArray(raw)) {
      throw new CatalogDataError(`Catalog local file must contain a JSON array: ${path}`);
    }
    return parseEntities(raw, path);
  }

  private async fetchEntities(owner: string): Promise<CatalogEntity[]> {
    const params = new URLSearchParams();
    params.append("filter", "kind=Component");
    params.append("filter", `spec.owner=group:${owner}`);

    const response = await this.fetchImpl(
      `${this.config.baseUrl}/entities?${params.toString()}`,
      {
        headers: {
          Authorization: `Bearer ${this.config.token}`,
          Accept: "application/json",
        },
      }
    );
    if (response.status !== 200) {
      throw new ServiceApiError("Catalog", response.status, await response.text());
    }

    const raw: unknown = await response.json();
    if (!Array.isArray(raw)) {
      throw new CatalogDataError("Catalog API did not return a JSON array.");
    }
    return parseEntities(raw, "catalog API");
  }
}

function parseEntities(raw: unknown[], source: string): CatalogEntity[] {
  const parsed = z.array(CatalogEntitySchema).safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new CatalogDataError(
      `Invalid catalog entity in ${source} at ${issue.path.join(".")}: ${issue.message}`
    );
  }
  return parsed.data;
}

// ============================================================
// Team / slug filtering
// ============================================================

export interface RepositoryFilter {
  team: string;
  defaultSlugs: readonly string[];
}

// Keeps repositories whose owner contains the team token or whose slug
// contains one of the slug tokens. With neither filter, keeps everything.
export function filterRepositories(
  repos: readonly Repository[],
  filter: RepositoryFilter
): Repository[] {
  const team = filter.team.trim().toLowerCase();
  const slugTokens = filter.defaultSlugs.map((slug) => slug.toLowerCase());

  if (!team && slugTokens.length === 0) {
    return [...repos];
  }

  return repos.filter((repo) => {
    const owner = (repo.owner ?? "").toLowerCase();
    const slug = (repo.githubSlug ?? "").toLowerCase();
    const teamMatch = team !== "" && owner.includes(team);
    const slugMatch = slugTokens.some((token) => slug.includes(token));
    return teamMatch || slugMatch;
  });
}
