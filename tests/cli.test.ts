// CHANGE: Confirm CLI wiring and exit codes around configuration handling.
// WHY: Exit code 1 is reserved for configuration failures; validation success leaves it untouched.

import os from "os";
import path from "path";
import fs from "fs-extra";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { applyLoggingOptions, buildProgram, runCli, syncAction, validateAction } from "../src/cli.js";
import { ConfigError } from "../src/errors.js";
import { configureLogger } from "../src/logger.js";

describe("CLI program", () => {
  it("registers expected commands", () => {
    const program = buildProgram();
    const subCommands = program.commands.map(command => command.name());
    expect(subCommands).toEqual(expect.arrayContaining(["sync", "validate"]));
  });
});

describe("CLI actions", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "rpm-sync-cli-"));
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    process.exitCode = undefined;
  });

  afterEach(async () => {
    process.exitCode = undefined;
    configureLogger({ level: "info", destination: "stderr" });
    vi.restoreAllMocks();
    await fs.remove(dir);
  });

  it("validates a correct configuration", async () => {
    const configPath = path.join(dir, "config.json");
    await fs.writeJson(configPath, { basePath: dir, projects: [{ owner: "acme", name: "widget", targetPath: "el8" }] });

    await expect(validateAction(configPath)).resolves.toBeUndefined();
  });

  it("sweeps an empty project list without touching the network", async () => {
    const configPath = path.join(dir, "config.json");
    await fs.writeJson(configPath, { basePath: dir, projects: [] });

    await expect(syncAction(configPath)).resolves.toEqual([]);
  });

  it("leaves the exit code unset after a successful validate run", async () => {
    const configPath = path.join(dir, "config.json");
    await fs.writeJson(configPath, { basePath: dir, projects: [] });

    await runCli(["node", "rpm-release-sync", "validate", "--config", configPath]);

    expect(process.exitCode).toBeUndefined();
  });

  it("sets exit code 1 when the configuration is invalid", async () => {
    const configPath = path.join(dir, "config.json");
    await fs.writeJson(configPath, { basePath: dir });

    await runCli(["node", "rpm-release-sync", "validate", "--config", configPath]);

    expect(process.exitCode).toBe(1);
  });

  it("rejects the file destination without a log file", () => {
    expect(() => applyLoggingOptions({ logDestination: "file" })).toThrow(ConfigError);
  });
});
