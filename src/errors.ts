// CHANGE: Typed failures for each pipeline stage plus helpers to describe thrown values.
// WHY: Outcomes report the failing stage with a one-line message, whatever was thrown.

import axios from "axios";

/**
 * Base class for every failure raised by the sync pipeline.
 */
export class SyncError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends SyncError {
  constructor(
    message: string,
    readonly configPath?: string,
    options?: ErrorOptions
  ) {
    super(configPath ? `${configPath}: ${message}` : message, options);
  }
}

export class DirectoryError extends SyncError {
  constructor(
    readonly directory: string,
    options?: ErrorOptions
  ) {
    super(`Cannot prepare target directory ${directory}: ${describeCause(options)}`, options);
  }
}

export class ResolutionError extends SyncError {
  constructor(
    message: string,
    readonly url: string,
    options?: ErrorOptions
  ) {
    super(`${message} (${url})`, options);
  }
}

export class PatternError extends SyncError {
  constructor(
    readonly pattern: string,
    options?: ErrorOptions
  ) {
    super(`Invalid asset pattern ${JSON.stringify(pattern)}: ${describeCause(options)}`, options);
  }
}

export class NoMatchError extends SyncError {
  constructor(
    readonly pattern: string,
    readonly candidates: readonly string[]
  ) {
    super(`No asset matches ${JSON.stringify(pattern)} among ${candidates.length} candidate(s)`);
  }
}

export class DownloadError extends SyncError {
  constructor(
    readonly url: string,
    options?: ErrorOptions
  ) {
    super(`Download failed for ${url}: ${describeCause(options)}`, options);
  }
}

export class WriteError extends SyncError {
  constructor(
    readonly path: string,
    message: string,
    options?: ErrorOptions
  ) {
    super(`Cannot write ${path}: ${message}`, options);
  }
}

export class PruneDeleteError extends SyncError {
  constructor(
    readonly path: string,
    options?: ErrorOptions
  ) {
    super(`Cannot delete ${path}: ${describeCause(options)}`, options);
  }
}

export class ToolError extends SyncError {
  constructor(
    message: string,
    readonly exitCode: number | null,
    readonly stderr: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/**
 * Render any thrown value as a single-line message, folding in HTTP status for axios failures.
 */
export function describeError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    return status ? `HTTP ${status}${error.response?.statusText ? ` ${error.response.statusText}` : ""}` : error.message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

function describeCause(options: ErrorOptions | undefined): string {
  return options?.cause === undefined ? "unknown error" : describeError(options.cause);
}

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && "code" in error && (typeof error.code === "string" || error.code === undefined);

export const getErrnoCode = (error: unknown): string | undefined =>
  isErrnoException(error) && typeof error.code === "string" ? error.code : undefined;
