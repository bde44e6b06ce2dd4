/**
 * Upstream Error Types
 *
 * Error types shared by the Netbox and Netshot HTTP clients
 */

import { isAxiosError } from "axios";
import type { ZodError } from "zod";

export type UpstreamName = "netbox" | "netshot";

/**
 * Base error class for all upstream API errors
 */
export class UpstreamError extends Error {
  constructor(
    message: string,
    public readonly upstream: UpstreamName,
    public readonly statusCode?: number,
    public readonly endpoint?: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = "UpstreamError";

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Thrown when the upstream rejects the credentials (401/403)
 */
export class UpstreamAuthError extends UpstreamError {
  constructor(message: string, upstream: UpstreamName, statusCode: number, endpoint?: string) {
    super(message, upstream, statusCode, endpoint);
    this.name = "UpstreamAuthError";
  }
}

/**
 * Thrown when a client is built from an unusable configuration
 */
export class UpstreamConfigError extends UpstreamError {
  constructor(message: string, upstream: UpstreamName, cause?: unknown) {
    super(message, upstream, undefined, undefined, cause);
    this.name = "UpstreamConfigError";
  }
}

export class UpstreamNotFoundError extends UpstreamError {
  constructor(resource: string, identifier: string, upstream: UpstreamName, endpoint?: string) {
    super(`${resource} not found: ${identifier}`, upstream, 404, endpoint);
    this.name = "UpstreamNotFoundError";
  }
}

/**
 * Thrown on gateway errors and on network failures (no response received)
 */
export class UpstreamUnavailableError extends UpstreamError {
  constructor(
    message: string,
    upstream: UpstreamName,
    statusCode?: number,
    endpoint?: string,
    cause?: unknown,
  ) {
    super(message, upstream, statusCode, endpoint, cause);
    this.name = "UpstreamUnavailableError";
  }
}

export class UpstreamTimeoutError extends UpstreamError {
  constructor(message: string, upstream: UpstreamName, endpoint?: string, cause?: unknown) {
    super(message, upstream, 408, endpoint, cause);
    this.name = "UpstreamTimeoutError";
  }
}

/**
 * Thrown when a response body does not have the expected shape
 */
export class UpstreamResponseError extends UpstreamError {
  constructor(
    message: string,
    upstream: UpstreamName,
    endpoint: string,
    public readonly issues: string[],
    cause?: ZodError,
  ) {
    super(message, upstream, undefined, endpoint, cause);
    this.name = "UpstreamResponseError";
  }
}

/**
 * Extract a readable message from an upstream error body
 */
function extractErrorMessage(data: unknown): string | undefined {
  if (typeof data === "string" && data.trim()) {
    return data.slice(0, 500);
  }

  if (data && typeof data === "object") {
    // Netbox answers { detail }, Netshot answers { errorMsg, errorCode }
    for (const key of ["detail", "errorMsg", "message", "error"]) {
      const value: unknown = Reflect.get(data, key);
      if (typeof value === "string" && value.trim()) {
        return value;
      }
    }
  }

  return undefined;
}

/**
 * Map an axios (or any other) failure to the matching UpstreamError
 */
export function parseUpstreamError(
  error: unknown,
  upstream: UpstreamName,
  endpoint: string,
): UpstreamError {
  if (error instanceof UpstreamError) {
    return error;
  }

  if (!isAxiosError(error)) {
    const message = error instanceof Error ? error.message : String(error);
    return new UpstreamError(`${upstream} request failed: ${message}`, upstream, undefined, endpoint, error);
  }

  if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
    return new UpstreamTimeoutError(`${upstream} request timed out: ${error.message}`, upstream, endpoint, error);
  }

  const response = error.response;
  if (!response) {
    return new UpstreamUnavailableError(
      `${upstream} is unreachable: ${error.message}`,
      upstream,
      undefined,
      endpoint,
      error,
    );
  }

  const statusCode = response.status;
  const detail = extractErrorMessage(response.data);
  const message = detail
    ? `${upstream} request failed with status ${statusCode}: ${detail}`
    : `${upstream} request failed with status ${statusCode}`;

  switch (statusCode) {
    case 401:
    case 403:
      return new UpstreamAuthError(message, upstream, statusCode, endpoint);

    case 404:
      return new UpstreamNotFoundError("Resource", endpoint, upstream, endpoint);

    case 408:
      return new UpstreamTimeoutError(message, upstream, endpoint, error);

    case 502:
    case 503:
    case 504:
      return new UpstreamUnavailableError(message, upstream, statusCode, endpoint, error);

    default:
      return new UpstreamError(message, upstream, statusCode, endpoint, error);
  }
}
