import {
  isCategory,
  validationFailure,
  type StageConfig,
  type WorkflowArtifact,
} from "@notes-to-blog/core";
import { fatal, recoverable, type StageFailureResult } from "../types.js";

export function subheadingCountGate(
  artifact: WorkflowArtifact,
  config: StageConfig
): StageFailureResult | undefined {
  const [min, max] = config.subheadingCountRange;
  const count = artifact.subheadings.length;
  if (count >= min && count <= max) return undefined;

  return recoverable(
    validationFailure(`analysis produced ${count} subheadings, expected ${min}-${max}`),
    { guidance: `Return between ${min} and ${max} subheadings; the last answer had ${count}.` }
  );
}

/**
 * An unknown category is never retried. The tag count is.
 */
export function metadataGate(
  artifact: WorkflowArtifact,
  config: StageConfig
): StageFailureResult | undefined {
  const category = artifact.category ?? "";
  if (!isCategory(category) || !config.categories.includes(category)) {
    return fatal(
      validationFailure(`category "${category}" is not allowed`, [
        `allowed: ${config.categories.join(", ")}`,
      ])
    );
  }

  const [min, max] = config.tagCountRange;
  const count = artifact.tags.length;
  if (count < min || count > max) {
    return recoverable(
      validationFailure(`metadata produced ${count} tags, expected ${min}-${max}`),
      { guidance: `Return between ${min} and ${max} distinct tags; the last answer had ${count}.` }
    );
  }
  return undefined;
}
