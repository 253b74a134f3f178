// CHANGE: Provide retrying HTTP utilities for release lookups and asset downloads.
// WHY: Transient 5xx responses and connection resets from the release host should not fail a project outright.

import axios, { AxiosError, AxiosInstance, AxiosResponse } from "axios";
import { GITHUB, NET } from "../config.js";
import { debug } from "../logger.js";

const RETRY_BASE_DELAY_MS = 500;

const httpClient: AxiosInstance = axios.create({
  timeout: NET.TIMEOUT,
  maxRedirects: 5,
  headers: {
    "User-Agent": "rpm-release-sync/1.0",
    Accept: "application/json",
    ...(GITHUB.TOKEN ? { Authorization: `Bearer ${GITHUB.TOKEN}` } : {})
  }
});

function sleep(delayMs: number): Promise<void> {
  return new Promise(resolve => {
    setTimeout(resolve, delayMs);
  });
}

function normaliseHeaders(headers: AxiosResponse["headers"]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (Array.isArray(value)) {
      out[key.toLowerCase()] = value.join(", ");
    } else if (typeof value === "string") {
      out[key.toLowerCase()] = value;
    }
  }
  return out;
}

function isRetryable(error: unknown): error is AxiosError {
  if (!axios.isAxiosError(error)) {
    return false;
  }
  const status = error.response?.status;
  const isNetworkIssue = error.code === "ECONNRESET" || error.code === "ETIMEDOUT" || error.code === "ECONNABORTED";
  const isRetryableStatus = typeof status === "number" && status >= 500 && status < 600;
  return isNetworkIssue || isRetryableStatus;
}

async function executeWithRetry<T>(operation: () => Promise<AxiosResponse<T>>, attempt: number): Promise<AxiosResponse<T>> {
  try {
    return await operation();
  } catch (error) {
    const nextAttempt = attempt + 1;
    if (nextAttempt >= NET.RETRIES || !isRetryable(error)) {
      throw error;
    }
    const backoff = RETRY_BASE_DELAY_MS * 2 ** attempt;
    debug(`HTTP retry (${nextAttempt}/${NET.RETRIES}) after ${backoff}ms for ${error.config?.url ?? "unknown-url"}`);
    await sleep(backoff);
    return executeWithRetry(operation, nextAttempt);
  }
}

/**
 * Perform GET request expecting JSON payload.
 *
 * @param url - Target URL.
 * @param accept - Media type sent in the Accept header.
 * @returns Response data and headers.
 */
export async function getJson<T>(
  url: string,
  accept = "application/json"
): Promise<{ readonly data: T; readonly headers: Record<string, string>; readonly status: number }> {
  const response = await executeWithRetry(() => httpClient.get<T>(url, { headers: { Accept: accept } }), 0);
  debug(`GET ${url} -> ${response.status}`);
  return {
    data: response.data,
    headers: normaliseHeaders(response.headers),
    status: response.status
  };
}

/**
 * Perform GET request expecting binary payload.
 *
 * @param url - Target URL.
 * @returns Buffer with binary payload and response headers.
 */
export async function getBinary(url: string): Promise<{ readonly data: Buffer; readonly headers: Record<string, string>; readonly status: number }> {
  const response = await executeWithRetry(
    () => httpClient.get<ArrayBuffer>(url, { responseType: "arraybuffer", headers: { Accept: "application/octet-stream" } }),
    0
  );
  debug(`GET ${url} -> ${response.status} (${response.data.byteLength} bytes)`);
  return {
    data: Buffer.from(response.data),
    headers: normaliseHeaders(response.headers),
    status: response.status
  };
}

export { httpClient };
