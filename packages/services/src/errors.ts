import type { CapabilityError, CapabilityErrorKind } from "./types.js";

/**
 * Thrown inside clients and caught at their boundary, where it becomes
 * a `CapabilityError` value.
 */
export class CapabilityCallError extends Error {
  constructor(
    readonly kind: CapabilityErrorKind,
    message: string,
    readonly status?: number
  ) {
    super(message);
    this.name = "CapabilityCallError";
  }
}

export function statusError(
  provider: string,
  status: number,
  body: string
): CapabilityCallError {
  const message = `${provider} API error ${status}: ${body.slice(0, 300)}`;
  if (status === 401 || status === 403) {
    return new CapabilityCallError("auth", message, status);
  }
  if (status === 429) {
    return new CapabilityCallError("rate_limited", message, status);
  }
  if (status === 408 || status === 504) {
    return new CapabilityCallError("timeout", message, status);
  }
  if (status === 503) {
    return new CapabilityCallError("unavailable", message, status);
  }
  return new CapabilityCallError("http", message, status);
}

export function toCapabilityError(err: unknown): CapabilityError {
  if (err instanceof CapabilityCallError) {
    return err.status === undefined
      ? { kind: err.kind, message: err.message }
      : { kind: err.kind, message: err.message, status: err.status };
  }
  if (err instanceof Error) {
    // AbortSignal.timeout() rejects fetch with a TimeoutError DOMException
    if (err.name === "TimeoutError" || err.name === "AbortError") {
      return { kind: "timeout", message: err.message };
    }
    return { kind: "network", message: err.message };
  }
  return { kind: "network", message: String(err) };
}

/**
 * Errors that will not go away by asking again.
 */
export function isPermanentError(error: unknown): boolean {
  if (!(error instanceof CapabilityCallError)) return false;
  if (error.kind === "auth") return true;
  return (
    error.kind === "http" &&
    error.status !== undefined &&
    error.status >= 400 &&
    error.status < 500
  );
}
