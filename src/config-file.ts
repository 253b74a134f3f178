// CHANGE: Load and validate the repository sync configuration document.
// WHY: The pipeline only ever sees a fully defaulted, read-only GlobalConfig.

import path from "path";
import fs from "fs-extra";
import { z } from "zod";
import { REPOSITORY } from "./config.js";
import { ConfigError, describeError, getErrnoCode } from "./errors.js";
import { debug, warn } from "./logger.js";
import { DEFAULT_ASSET_PATTERN } from "./selector.js";
import type { GlobalConfig, ProjectConfig } from "./types.js";

export const ProjectSchema = z
  .object({
    owner: z.string().min(1),
    name: z.string().min(1),
    targetPath: z.string().min(1),
    assetPattern: z.string().min(1).optional(),
    keepCount: z.number().int().min(0).optional()
  })
  .strict();

export const ConfigSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    basePath: z.string().min(1),
    indexCommand: z.string().min(1).optional(),
    projects: z.array(ProjectSchema)
  })
  .strict();

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Validate a parsed document and apply defaults. Does not touch the filesystem.
 *
 * @throws ConfigError on schema violations or a relative basePath.
 */
export function parseConfig(value: unknown, configPath?: string): GlobalConfig {
  const parsed = ConfigSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error), configPath);
  }
  const { basePath, indexCommand, projects } = parsed.data;
  if (!path.isAbsolute(basePath)) {
    throw new ConfigError(`basePath must be absolute, got ${JSON.stringify(basePath)}`, configPath);
  }
  projects.forEach((project, index) => {
    if (!isInsideBase(basePath, resolveTargetDir({ basePath }, project))) {
      throw new ConfigError(
        `projects.${index}.targetPath: ${JSON.stringify(project.targetPath)} resolves outside basePath`,
        configPath
      );
    }
  });
  return {
    basePath,
    indexCommand: indexCommand ?? REPOSITORY.INDEX_COMMAND,
    projects: projects.map(
      (project): ProjectConfig => ({
        owner: project.owner,
        name: project.name,
        targetPath: project.targetPath,
        assetPattern: project.assetPattern ?? DEFAULT_ASSET_PATTERN,
        keepCount: project.keepCount ?? REPOSITORY.DEFAULT_KEEP_COUNT
      })
    )
  };
}

export function resolveTargetDir(config: Pick<GlobalConfig, "basePath">, project: Pick<ProjectConfig, "targetPath">): string {
  return path.resolve(path.join(config.basePath, project.targetPath));
}

// basePath itself counts as inside.
function isInsideBase(basePath: string, dir: string): boolean {
  const relative = path.relative(path.resolve(basePath), dir);
  return relative === "" || (relative !== ".." && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative));
}

/**
 * Group projects that resolve to the same target directory.
 *
 * @returns Map of shared directory to the `owner/name` ids using it.
 */
export function findDuplicateTargets(config: GlobalConfig): Map<string, string[]> {
  const byDir = new Map<string, string[]>();
  for (const project of config.projects) {
    const dir = resolveTargetDir(config, project);
    byDir.set(dir, [...(byDir.get(dir) ?? []), `${project.owner}/${project.name}`]);
  }
  return new Map([...byDir].filter(([, ids]) => ids.length > 1));
}

/**
 * Read, validate and default the configuration file at `configPath`.
 *
 * @throws ConfigError when the file is unreadable, malformed or names a missing base directory.
 */
export async function loadConfig(configPath: string): Promise<GlobalConfig> {
  let document: unknown;
  try {
    document = await fs.readJson(configPath);
  } catch (cause) {
    const reason = getErrnoCode(cause) === "ENOENT" ? "configuration file not found" : `cannot read configuration: ${describeError(cause)}`;
    throw new ConfigError(reason, configPath, { cause });
  }
  const config = parseConfig(document, configPath);

  const stats = await fs.stat(config.basePath).catch(() => null);
  if (!stats?.isDirectory()) {
    throw new ConfigError(`basePath ${config.basePath} is not an existing directory`, configPath);
  }

  for (const [dir, ids] of findDuplicateTargets(config)) {
    warn(`Projects ${ids.join(", ")} share target directory ${dir}; retention applies to their combined files.`);
  }
  debug(`Loaded ${config.projects.length} project(s) from ${configPath}`);
  return config;
}
