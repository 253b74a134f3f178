// CHANGE: Regenerate repository metadata by running the external indexing tool in update mode.
// WHY: Success requires a zero exit status AND an empty error stream; warnings on stderr count as failure.

import { REPOSITORY } from "./config.js";
import { ToolError, describeError } from "./errors.js";
import { debug, info, warn } from "./logger.js";
import { runCommand, type CommandResult, type CommandRunner } from "./utils/exec.js";

export interface RebuildOptions {
  readonly command?: string;
  readonly runner?: CommandRunner;
}

/**
 * Run `<command> --update <targetDir>`.
 *
 * @throws ToolError when the tool cannot start, exits non-zero, or writes anything to stderr.
 */
export async function rebuildMetadata(targetDir: string, options: RebuildOptions = {}): Promise<void> {
  const command = options.command ?? REPOSITORY.INDEX_COMMAND;
  const runner = options.runner ?? runCommand;
  const args = [REPOSITORY.INDEX_UPDATE_FLAG, targetDir];

  let result: CommandResult;
  try {
    result = await runner(command, args);
  } catch (cause) {
    throw new ToolError(`Cannot run ${command}: ${describeError(cause)}`, null, "", { cause });
  }

  if (result.stdout.length > 0) {
    debug(`${command} output for ${targetDir}: ${result.stdout.trim()}`);
  }
  if (result.exitCode !== 0) {
    const status = result.exitCode === null ? "was terminated by a signal" : `exited with status ${result.exitCode}`;
    throw new ToolError(`${command} ${status} for ${targetDir}: ${result.stderr.trim()}`, result.exitCode, result.stderr);
  }
  if (result.stderr.length > 0) {
    warn(`${command} reported diagnostics for ${targetDir}: ${result.stderr.trim()}`);
    throw new ToolError(`${command} wrote to stderr for ${targetDir}`, result.exitCode, result.stderr);
  }
  info(`Repository metadata updated in ${targetDir}.`);
}
