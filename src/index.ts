#!/usr/bin/env node
// CHANGE: Delegate execution to modular CLI runner.
// WHY: Importing the package must not parse arguments or start a sync.

import { pathToFileURL } from "url";
import { runCli } from "./cli.js";

const executedDirectly = process.argv[1]
  ? pathToFileURL(process.argv[1]).href === import.meta.url
  : false;

if (executedDirectly) {
  void runCli(process.argv);
}

export { runCli };
export { loadConfig, parseConfig } from "./config-file.js";
export { syncAll, syncProject, defaultStages } from "./sync.js";
export type { SyncStages } from "./sync.js";
export type { GlobalConfig, ProjectConfig, ProjectOutcome, ReleaseInfo, ReleaseAsset } from "./types.js";
