// CHANGE: Run external tools without a shell and capture their status and output.
// WHY: The indexing tool is judged on exit status and stderr, so both must reach the caller.

import { execFile } from "child_process";
import { promisify } from "util";

const execFileAsync = promisify(execFile);

const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

export interface CommandResult {
  /** `null` when the process was terminated by a signal. */
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;
}

export type CommandRunner = (command: string, args: readonly string[]) => Promise<CommandResult>;

function readOutput(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  return Buffer.isBuffer(value) ? value.toString("utf8") : "";
}

/**
 * Run a command without a shell and capture its exit status and output.
 *
 * Resolves for every process that ran, whatever its exit status.
 *
 * @throws Error when the process could not be started (e.g. ENOENT).
 */
export const runCommand: CommandRunner = async (command, args) => {
  try {
    const { stdout, stderr } = await execFileAsync(command, [...args], {
      encoding: "utf8",
      maxBuffer: MAX_OUTPUT_BYTES
    });
    return { exitCode: 0, stdout, stderr };
  } catch (error) {
    if (typeof error !== "object" || error === null) {
      throw error;
    }
    // numeric or null code: the process ran; a string code is a spawn failure
    const code = "code" in error ? error.code : undefined;
    if (typeof code === "number" || code === null) {
      return {
        exitCode: code,
        stdout: "stdout" in error ? readOutput(error.stdout) : "",
        stderr: "stderr" in error ? readOutput(error.stderr) : ""
      };
    }
    throw error;
  }
};
