// CHANGE: Orchestrate resolve → select → fetch → prune → rebuild for every configured project.
// WHY: One project's failure must never abort the sweep; each project ends DONE or FAILED independently.

import fs from "fs-extra";
import { resolveTargetDir } from "./config-file.js";
import { DirectoryError, describeError } from "./errors.js";
import { fetchArtifact } from "./fetcher.js";
import { debug, error as logError, info } from "./logger.js";
import { pruneArtifacts, type PruneResult } from "./pruner.js";
import { rebuildMetadata } from "./rebuilder.js";
import { resolveLatestRelease } from "./release.js";
import { selectAsset } from "./selector.js";
import type {
  ActiveState,
  FetchResult,
  GlobalConfig,
  ProjectConfig,
  ProjectOutcome,
  ReleaseAsset,
  ReleaseInfo
} from "./types.js";

/**
 * Stage implementations used by the orchestrator, one per pipeline state.
 */
export interface SyncStages {
  readonly prepare: (targetDir: string) => Promise<void>;
  readonly resolve: (owner: string, name: string) => Promise<ReleaseInfo>;
  readonly select: (assets: readonly ReleaseAsset[], template: string, version: string) => ReleaseAsset;
  readonly fetch: (asset: ReleaseAsset, targetDir: string) => Promise<FetchResult>;
  readonly prune: (targetDir: string, keepCount: number) => Promise<PruneResult>;
  readonly rebuild: (targetDir: string) => Promise<void>;
}

/**
 * Create `targetDir` and any missing parents; succeed if it already exists as a directory.
 *
 * @throws DirectoryError when creation fails or a non-directory occupies the path.
 */
export async function prepareTargetDir(targetDir: string): Promise<void> {
  try {
    await fs.ensureDir(targetDir);
  } catch (cause) {
    throw new DirectoryError(targetDir, { cause });
  }
}

export function defaultStages(config: GlobalConfig): SyncStages {
  return {
    prepare: prepareTargetDir,
    resolve: resolveLatestRelease,
    select: selectAsset,
    fetch: fetchArtifact,
    prune: (targetDir, keepCount) => pruneArtifacts(targetDir, keepCount),
    rebuild: targetDir => rebuildMetadata(targetDir, { command: config.indexCommand })
  };
}

export function projectId(project: Pick<ProjectConfig, "owner" | "name">): string {
  return `${project.owner}/${project.name}`;
}

/**
 * Run the full pipeline for one project. Never throws; failures become a `FAILED` outcome.
 */
export async function syncProject(project: ProjectConfig, config: GlobalConfig, stages: SyncStages): Promise<ProjectOutcome> {
  const id = projectId(project);
  const targetDir = resolveTargetDir(config, project);
  let state: ActiveState = "PREPARING";
  let artifact: string | undefined;
  let downloaded = false;
  let pruned: readonly string[] = [];

  const enter = (next: ActiveState): void => {
    debug(`[${id}] ${state} -> ${next}`);
    state = next;
  };

  try {
    await stages.prepare(targetDir);

    enter("RESOLVING");
    const release = await stages.resolve(project.owner, project.name);

    enter("SELECTING");
    const asset = stages.select(release.assets, project.assetPattern, release.version);
    artifact = asset.name;

    enter("FETCHING");
    const fetched = await stages.fetch(asset, targetDir);
    downloaded = fetched.downloaded;

    enter("PRUNING");
    const retention = await stages.prune(targetDir, project.keepCount);
    pruned = retention.deleted;

    enter("REBUILDING");
    await stages.rebuild(targetDir);
  } catch (cause) {
    logError(`[${id}] failed while ${state}: ${describeError(cause)}`);
    return {
      project: id,
      targetDir,
      state: "FAILED",
      failedAt: state,
      error: describeError(cause),
      artifact,
      downloaded,
      pruned
    };
  }

  info(`[${id}] synced ${artifact ?? "release"} into ${targetDir}${downloaded ? " (new download)" : ""}.`);
  return { project: id, targetDir, state: "DONE", artifact, downloaded, pruned };
}

/**
 * Sync every configured project in order, one at a time.
 *
 * @returns One outcome per project, in configuration order.
 */
export async function syncAll(config: GlobalConfig, stages: SyncStages = defaultStages(config)): Promise<ProjectOutcome[]> {
  info(`Sync starting for ${config.projects.length} project(s) under ${config.basePath}.`);
  const outcomes: ProjectOutcome[] = [];
  for (const project of config.projects) {
    outcomes.push(await syncProject(project, config, stages));
  }
  const failed = outcomes.filter(outcome => outcome.state === "FAILED").length;
  info(`Sync complete: ${outcomes.length - failed} succeeded, ${failed} failed.`);
  return outcomes;
}
