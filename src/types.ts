// CHANGE: Define typed domain models for the release synchronisation pipeline.
// WHY: Configuration is read-only after load and release data lives for a single project iteration.

/**
 * JSON-like value type used for upstream payloads without `any` usage.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | JsonValue[]
  | readonly JsonValue[]
  | { [key: string]: JsonValue };

/**
 * One upstream project mirrored into a local repository directory.
 *
 * @property owner - Account or organisation hosting the project.
 * @property name - Repository name.
 * @property targetPath - Directory relative to `GlobalConfig.basePath`.
 * @property assetPattern - Full-match pattern, may embed the version placeholder.
 * @property keepCount - Number of most recently modified artifacts to retain.
 *
 * Invariant: `targetPath` should be unique within a config; sharing it is allowed but merges retention.
 */
export interface ProjectConfig {
  readonly owner: string;
  readonly name: string;
  readonly targetPath: string;
  readonly assetPattern: string;
  readonly keepCount: number;
}

export interface GlobalConfig {
  readonly basePath: string;
  readonly indexCommand: string;
  readonly projects: readonly ProjectConfig[];
}

export interface ReleaseAsset {
  readonly name: string;
  readonly downloadUrl: string;
}

/**
 * Latest release as resolved for a single run.
 *
 * @property tag - Raw tag as published upstream.
 * @property version - Tag with a single leading non-digit character removed.
 * @property assets - Assets in the order the source returned them.
 */
export interface ReleaseInfo {
  readonly tag: string;
  readonly version: string;
  readonly assets: readonly ReleaseAsset[];
}

export interface FetchResult {
  readonly path: string;
  readonly downloaded: boolean;
  readonly bytes?: number;
}

/**
 * Per-project pipeline states; `FAILED` is reachable from every non-terminal state.
 */
export type ProjectState =
  | "PREPARING"
  | "RESOLVING"
  | "SELECTING"
  | "FETCHING"
  | "PRUNING"
  | "REBUILDING"
  | "DONE"
  | "FAILED";

export type ActiveState = Exclude<ProjectState, "DONE" | "FAILED">;

/**
 * Result of one project iteration as reported by the orchestrator.
 *
 * @property project - `owner/name` identifier.
 * @property failedAt - State that was active when the iteration failed.
 * @property artifact - Selected asset name, once selection succeeded.
 * @property downloaded - Whether a new file was written this run.
 * @property pruned - Absolute paths removed by retention.
 */
export interface ProjectOutcome {
  readonly project: string;
  readonly targetDir: string;
  readonly state: "DONE" | "FAILED";
  readonly failedAt?: ActiveState;
  readonly error?: string;
  readonly artifact?: string;
  readonly downloaded: boolean;
  readonly pruned: readonly string[];
}
