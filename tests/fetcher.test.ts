// CHANGE: Exercise idempotent downloads against a real temporary directory.
// WHY: File existence is the only state; a skipped fetch must not touch the network.

import os from "os";
import path from "path";
import fs from "fs-extra";
import { AxiosError, AxiosResponse, InternalAxiosRequestConfig } from "axios";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DownloadError, WriteError } from "../src/errors.js";
import { fetchArtifact, partialPath } from "../src/fetcher.js";
import { httpClient } from "../src/utils/http.js";

const dummyConfig = {
  url: "https://dl.example.com",
  headers: {}
} as InternalAxiosRequestConfig;

const asset = {
  name: "widget-1.2.3-1.el8.x86_64.rpm",
  downloadUrl: "https://dl.example.com/widget-1.2.3-1.el8.x86_64.rpm"
};

function binary(bytes: number[]): AxiosResponse<ArrayBuffer> {
  return { status: 200, statusText: "OK", headers: {}, config: dummyConfig, data: new Uint8Array(bytes).buffer };
}

describe("fetchArtifact", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "rpm-sync-fetch-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.remove(dir);
  });

  it("downloads into the target directory", async () => {
    const spy = vi.spyOn(httpClient, "get").mockResolvedValue(binary([0xed, 0xab, 0xee, 0xdb]));

    const result = await fetchArtifact(asset, dir);

    const destination = path.join(dir, asset.name);
    expect(result).toEqual({ path: destination, downloaded: true, bytes: 4 });
    expect([...(await fs.readFile(destination))]).toEqual([0xed, 0xab, 0xee, 0xdb]);
    expect(await fs.pathExists(partialPath(dir, asset.name))).toBe(false);
    expect(spy).toHaveBeenCalledTimes(1);
  });

  it("skips the download when the file already exists", async () => {
    const spy = vi.spyOn(httpClient, "get").mockResolvedValue(binary([1]));

    await fetchArtifact(asset, dir);
    const second = await fetchArtifact(asset, dir);

    expect(second).toEqual({ path: path.join(dir, asset.name), downloaded: false });
    expect(spy).toHaveBeenCalledTimes(1);
    expect(await fs.readdir(dir)).toEqual([asset.name]);
  });

  it("raises DownloadError and writes nothing on HTTP failure", async () => {
    const forbidden = new AxiosError("Request failed with status code 403");
    forbidden.response = { status: 403, statusText: "Forbidden", headers: {}, config: dummyConfig, data: null };
    vi.spyOn(httpClient, "get").mockRejectedValue(forbidden);

    const failure = fetchArtifact(asset, dir);
    await expect(failure).rejects.toBeInstanceOf(DownloadError);
    await expect(failure).rejects.toThrow(`Download failed for ${asset.downloadUrl}: HTTP 403 Forbidden`);
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it("raises WriteError when the directory is not writable", async () => {
    vi.spyOn(httpClient, "get").mockResolvedValue(binary([1, 2]));
    const missingDir = path.join(dir, "does-not-exist");

    await expect(fetchArtifact(asset, missingDir)).rejects.toBeInstanceOf(WriteError);
    expect(await fs.pathExists(missingDir)).toBe(false);
  });

  it("refuses asset names that are not plain file names", async () => {
    const spy = vi.spyOn(httpClient, "get");

    await expect(fetchArtifact({ name: "../escape.rpm", downloadUrl: "https://dl.example.com/x" }, dir)).rejects.toThrow(
      WriteError
    );
    expect(spy).not.toHaveBeenCalled();
  });
});
