/**
 * Failure taxonomy shared by stages, the orchestrator and the batch runner.
 */
export type FailureKind =
  | "ValidationFailure"
  | "CapabilityFailure"
  | "UnavailableDependency"
  | "Cancelled";

export interface StageFailure {
  kind: FailureKind;
  message: string;
  details?: string[];
}

export function validationFailure(
  message: string,
  details?: string[]
): StageFailure {
  return details ? { kind: "ValidationFailure", message, details } : { kind: "ValidationFailure", message };
}

export function capabilityFailure(message: string): StageFailure {
  return { kind: "CapabilityFailure", message };
}

export function unavailableDependency(capability: string): StageFailure {
  return {
    kind: "UnavailableDependency",
    message: `${capability} capability is unavailable`,
  };
}

export function formatFailure(failure: StageFailure): string {
  const base = `${failure.kind}: ${failure.message}`;
  return failure.details?.length
    ? `${base} (${failure.details.join("; ")})`
    : base;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
