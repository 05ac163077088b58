import {
  CompletedArtifactSchema,
  validationFailure,
  type CompletedArtifact,
  type StageFailure,
  type WorkflowArtifact,
} from "@notes-to-blog/core";
import { fatal, success, type StageResult } from "../types.js";

export type CompletionCheck =
  | { ok: true; artifact: CompletedArtifact }
  | { ok: false; failure: StageFailure };

export function checkCompleted(artifact: WorkflowArtifact): CompletionCheck {
  const parsed = CompletedArtifactSchema.safeParse(artifact);
  if (parsed.success) return { ok: true, artifact: parsed.data };

  const missing = parsed.error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
  return { ok: false, failure: validationFailure("artifact is incomplete", missing) };
}

/**
 * Finalize Stage: no external calls, only the completeness check.
 */
export async function runFinalizeStage(artifact: WorkflowArtifact): Promise<StageResult> {
  const check = checkCompleted(artifact);
  return check.ok ? success(check.artifact) : fatal(check.failure);
}
