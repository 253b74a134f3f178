// CHANGE: Enforce directory-scoped retention over downloaded package files.
// WHY: Retention counts every package file in the directory, including ones left by an earlier asset pattern.

import path from "path";
import fs from "fs-extra";
import { REPOSITORY } from "./config.js";
import { PruneDeleteError, getErrnoCode } from "./errors.js";
import { debug, info, warn } from "./logger.js";

export interface ArtifactEntry {
  readonly path: string;
  readonly name: string;
  readonly mtimeMs: number;
}

export interface PruneResult {
  readonly kept: readonly string[];
  readonly deleted: readonly string[];
  readonly failed: readonly PruneDeleteError[];
}

export type RemoveFile = (filePath: string) => Promise<void>;

const unlinkFile: RemoveFile = filePath => fs.unlink(filePath);

/**
 * List regular package files directly inside `targetDir`, oldest first.
 * Files that disappear while listing are skipped.
 */
export async function listArtifacts(targetDir: string): Promise<ArtifactEntry[]> {
  const entries = await fs.readdir(targetDir, { withFileTypes: true });
  const artifacts = await Promise.all(
    entries
      .filter(entry => entry.isFile() && entry.name.endsWith(REPOSITORY.PACKAGE_SUFFIX))
      .map(async (entry): Promise<ArtifactEntry | null> => {
        const filePath = path.join(targetDir, entry.name);
        try {
          const stats = await fs.stat(filePath);
          return { path: filePath, name: entry.name, mtimeMs: stats.mtimeMs };
        } catch (cause) {
          // removed between readdir and stat
          if (getErrnoCode(cause) === "ENOENT") {
            return null;
          }
          throw cause;
        }
      })
  );
  return artifacts
    .filter((artifact): artifact is ArtifactEntry => artifact !== null)
    .sort((left, right) => left.mtimeMs - right.mtimeMs || left.name.localeCompare(right.name));
}

/**
 * Delete all but the `keepCount` most recently modified package files.
 *
 * Each deletion is independent: a failure is recorded and logged, and pruning continues.
 *
 * @param removeFile - Deletion primitive, defaults to unlink.
 */
export async function pruneArtifacts(
  targetDir: string,
  keepCount: number,
  removeFile: RemoveFile = unlinkFile
): Promise<PruneResult> {
  const artifacts = await listArtifacts(targetDir);
  const cutoff = Math.max(0, artifacts.length - keepCount);
  const expired = artifacts.slice(0, cutoff);
  const kept = artifacts.slice(cutoff).map(artifact => artifact.path);

  const deleted: string[] = [];
  const failed: PruneDeleteError[] = [];
  for (const artifact of expired) {
    try {
      await removeFile(artifact.path);
      deleted.push(artifact.path);
      debug(`Pruned ${artifact.path}`);
    } catch (cause) {
      const failure = new PruneDeleteError(artifact.path, { cause });
      warn(failure.message);
      failed.push(failure);
    }
  }

  if (expired.length > 0) {
    info(`Retention in ${targetDir}: kept ${kept.length}, deleted ${deleted.length}, failed ${failed.length}.`);
  }
  return { kept, deleted, failed };
}
