// CHANGE: Download a selected asset into its repository directory exactly once.
// WHY: A re-run must not re-download artifacts already on disk, and a crash must never leave a partial file under the final name.

import path from "path";
import fs from "fs-extra";
import sanitize from "sanitize-filename";
import { DownloadError, WriteError, describeError } from "./errors.js";
import { debug, info } from "./logger.js";
import type { FetchResult, ReleaseAsset } from "./types.js";
import { getBinary } from "./utils/http.js";

/**
 * Temporary download location beside the final file; never ends with the package suffix.
 */
export function partialPath(targetDir: string, assetName: string): string {
  return path.join(targetDir, `.${assetName}.part`);
}

/**
 * Fetch `asset` into `targetDir` unless a file of the same name already exists there.
 *
 * @throws WriteError for unsafe asset names or local write failures.
 * @throws DownloadError on transport failure or non-success response.
 */
export async function fetchArtifact(asset: ReleaseAsset, targetDir: string): Promise<FetchResult> {
  const destination = path.join(targetDir, asset.name);
  if (asset.name.length === 0 || sanitize(asset.name) !== asset.name) {
    throw new WriteError(destination, `asset name ${JSON.stringify(asset.name)} is not a plain file name`);
  }

  if (await fs.pathExists(destination)) {
    info(`Artifact ${asset.name} already present, skipping download.`);
    return { path: destination, downloaded: false };
  }

  let payload: Buffer;
  try {
    payload = (await getBinary(asset.downloadUrl)).data;
  } catch (cause) {
    throw new DownloadError(asset.downloadUrl, { cause });
  }

  const tempPath = partialPath(targetDir, asset.name);
  try {
    await fs.writeFile(tempPath, payload);
    await fs.move(tempPath, destination, { overwrite: true });
  } catch (cause) {
    await fs.remove(tempPath).catch((cleanupError: unknown) => {
      debug(`Could not remove partial download ${tempPath}: ${describeError(cleanupError)}`);
    });
    throw new WriteError(destination, describeError(cause), { cause });
  }

  info(`Downloaded ${asset.name} (${payload.byteLength} bytes).`);
  return { path: destination, downloaded: true, bytes: payload.byteLength };
}
