// CHANGE: Resolve the latest published release of an upstream project.
// WHY: The version and asset list are fetched fresh every run; nothing about them is persisted.

import { GITHUB } from "./config.js";
import { ResolutionError, describeError } from "./errors.js";
import { debug } from "./logger.js";
import type { JsonValue, ReleaseAsset, ReleaseInfo } from "./types.js";
import { getJson } from "./utils/http.js";

const GITHUB_MEDIA_TYPE = "application/vnd.github+json";

function isRecord(value: JsonValue): value is { readonly [key: string]: JsonValue } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Strip one leading non-digit character from a release tag.
 *
 * `v2.1.0` becomes `2.1.0`; `2.1.0` is returned unchanged; an empty tag yields an empty version.
 */
export function normalizeVersion(tag: string): string {
  if (tag.length === 0 || /^\d/.test(tag)) {
    return tag;
  }
  return tag.slice(1);
}

export function releaseUrl(owner: string, name: string): string {
  return `${GITHUB.API_URL}/repos/${encodeURIComponent(owner)}/${encodeURIComponent(name)}/releases/latest`;
}

/**
 * Validate a latest-release document and convert it into `ReleaseInfo`.
 *
 * @throws ResolutionError when the document lacks a string tag or well-formed assets.
 */
export function parseRelease(value: JsonValue, url: string): ReleaseInfo {
  if (!isRecord(value)) {
    throw new ResolutionError("Release response is not a JSON object", url);
  }
  const tag = value.tag_name;
  if (typeof tag !== "string") {
    throw new ResolutionError("Release response has no tag_name", url);
  }
  const rawAssets = value.assets;
  if (!Array.isArray(rawAssets)) {
    throw new ResolutionError("Release response has no assets list", url);
  }
  const assets = rawAssets.map((raw: JsonValue, index: number): ReleaseAsset => {
    if (!isRecord(raw) || typeof raw.name !== "string" || typeof raw.browser_download_url !== "string") {
      throw new ResolutionError(`Malformed asset at index ${index}`, url);
    }
    return { name: raw.name, downloadUrl: raw.browser_download_url };
  });
  return { tag, version: normalizeVersion(tag), assets };
}

/**
 * Fetch the latest release for `owner/name`.
 *
 * @throws ResolutionError on transport failure, non-success status or unparseable payload.
 */
export async function resolveLatestRelease(owner: string, name: string): Promise<ReleaseInfo> {
  const url = releaseUrl(owner, name);
  let payload: JsonValue;
  try {
    const response = await getJson<JsonValue>(url, GITHUB_MEDIA_TYPE);
    payload = response.data;
  } catch (cause) {
    throw new ResolutionError(`Release lookup failed: ${describeError(cause)}`, url, { cause });
  }
  const release = parseRelease(payload, url);
  debug(`Resolved ${owner}/${name} tag ${JSON.stringify(release.tag)} with ${release.assets.length} asset(s)`);
  return release;
}
