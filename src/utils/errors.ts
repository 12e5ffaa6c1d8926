/**
 * ERROR TAXONOMY
 * ==============
 * Fetcher failures are NetworkError (transport, timeout) or ApiError
 * (error status, unexpected payload). Notifier failures are DeliveryError.
 */

import { ErrorKind } from "../types";

export class MonitorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NetworkError extends MonitorError {}

export class ApiError extends MonitorError {
  /** HTTP status, absent when the payload itself was unusable */
  readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.status = status;
  }
}

export class DeliveryError extends MonitorError {}

export class ConfigError extends MonitorError {}

export function classifyError(error: unknown): ErrorKind {
  if (error instanceof NetworkError) return "network";
  if (error instanceof ApiError) return "api";
  return "unknown";
}

/**
 * Worth retrying within the same request: transport failures,
 * rate limiting and server-side errors.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof NetworkError) return true;
  if (error instanceof ApiError && error.status !== undefined) {
    return error.status === 429 || error.status >= 500;
  }
  return false;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
