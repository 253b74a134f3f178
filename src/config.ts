// CHANGE: Centralise environment-derived settings for the release sync job.
// WHY: Tokens, timeouts and tool names differ per host and must not live in the repository config file.

import * as dotenv from "dotenv";

dotenv.config();

function readInt(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * Upstream release source settings.
 *
 * `TOKEN` is optional; anonymous requests are subject to lower rate limits.
 */
export const GITHUB = {
  API_URL: (process.env.GITHUB_API_URL ?? "https://api.github.com").replace(/\/+$/, ""),
  TOKEN: process.env.GITHUB_TOKEN ?? ""
} as const;

/**
 * Network-level configuration for HTTP operations.
 *
 * Invariant: `RETRIES` is at least 1 (a single attempt).
 */
export const NET = {
  TIMEOUT: readInt(process.env.HTTP_TIMEOUT, 30000),
  RETRIES: Math.max(1, readInt(process.env.HTTP_RETRIES, 3))
} as const;

/**
 * Repository layout constants shared by the selector, pruner and rebuilder.
 */
export const REPOSITORY = {
  PACKAGE_SUFFIX: ".rpm",
  VERSION_PLACEHOLDER: "{latest_version}",
  DEFAULT_KEEP_COUNT: 3,
  INDEX_COMMAND: process.env.RPM_SYNC_INDEX_COMMAND ?? "createrepo_c",
  INDEX_UPDATE_FLAG: "--update"
} as const;

export const CLI = {
  DEFAULT_CONFIG_PATH: process.env.RPM_SYNC_CONFIG ?? "/etc/rpm-release-sync/config.json"
} as const;

export const LOGGING = {
  LEVEL: process.env.RPM_SYNC_LOG_LEVEL ?? "info"
} as const;
