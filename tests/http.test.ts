// CHANGE: Confirm HTTP helpers retry transient failures and fail fast otherwise.
// WHY: Only 5xx and connection resets are retried; a 404 from the release host is final.

import { AxiosError, AxiosResponse, InternalAxiosRequestConfig } from "axios";
import { afterEach, describe, expect, it, vi } from "vitest";
import { getBinary, getJson, httpClient } from "../src/utils/http.js";

const dummyConfig = {
  url: "https://example.com/data",
  headers: {}
} as InternalAxiosRequestConfig;

function failure(status: number, statusText: string): AxiosError {
  const error = new AxiosError(statusText);
  error.response = {
    status,
    statusText,
    headers: {},
    config: dummyConfig,
    data: null
  } satisfies AxiosResponse;
  return error;
}

describe("getJson", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("retries on 5xx responses", async () => {
    const success = {
      status: 200,
      statusText: "OK",
      headers: {},
      config: dummyConfig,
      data: { value: "ok" }
    } satisfies AxiosResponse<{ readonly value: string }>;

    const spy = vi.spyOn(httpClient, "get");
    spy.mockRejectedValueOnce(failure(500, "Server Error"));
    spy.mockResolvedValueOnce(success);

    const response = await getJson<{ readonly value: string }>("https://example.com/data");
    expect(response.data.value).toBe("ok");
    expect(spy).toHaveBeenCalledTimes(2);
  });

  it("does not retry client errors", async () => {
    const spy = vi.spyOn(httpClient, "get");
    spy.mockRejectedValue(failure(404, "Not Found"));

    await expect(getJson("https://example.com/missing")).rejects.toBeInstanceOf(AxiosError);
    expect(spy).toHaveBeenCalledTimes(1);
  });
});

describe("getBinary", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("requests an array buffer and returns a Buffer", async () => {
    const spy = vi.spyOn(httpClient, "get").mockResolvedValue({
      status: 200,
      statusText: "OK",
      headers: { "Content-Type": "application/x-rpm" },
      config: dummyConfig,
      data: new Uint8Array([1, 2, 3]).buffer
    } satisfies AxiosResponse<ArrayBuffer>);

    const response = await getBinary("https://example.com/pkg.rpm");

    expect(Buffer.isBuffer(response.data)).toBe(true);
    expect([...response.data]).toEqual([1, 2, 3]);
    expect(response.headers["content-type"]).toBe("application/x-rpm");
    expect(spy).toHaveBeenCalledWith("https://example.com/pkg.rpm", {
      responseType: "arraybuffer",
      headers: { Accept: "application/octet-stream" }
    });
  });
});
