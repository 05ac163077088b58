import {
  createChildLogger,
  validationFailure,
  type Subheading,
  type WorkflowArtifact,
} from "@notes-to-blog/core";
import { fatal, success, type StageContext, type StageResult } from "../types.js";

const logger = createChildLogger({ module: "pipeline:outline-validate" });

/**
 * Strip the markdown heading markers and list numbering LLMs like to add.
 */
export function cleanHeading(text: string): string {
  return text
    .replace(/\s+/g, " ")
    .trim()
    .replace(/^(#+|[-*]|\d+[.)])\s+/, "")
    .trim();
}

/** Cleaned headings without empty entries or case-insensitive repeats. */
export function usableHeadings(titles: readonly string[]): string[] {
  const seen = new Set<string>();
  const headings: string[] = [];
  for (const title of titles) {
    const cleaned = cleanHeading(title);
    const key = cleaned.toLowerCase();
    if (!cleaned || seen.has(key)) continue;
    seen.add(key);
    headings.push(cleaned);
  }
  return headings;
}

/**
 * Outline Validation Stage: tidy the analysis output and reject outlines
 * that are unusable after cleaning. Makes no external calls.
 */
export async function runOutlineValidateStage(
  artifact: WorkflowArtifact,
  context: StageContext
): Promise<StageResult> {
  const [min, max] = context.config.subheadingCountRange;
  const title = (artifact.title ?? "").trim();
  const description = (artifact.description ?? "").trim();

  const seen = new Set<string>();
  const subheadings: Subheading[] = [];
  for (const sub of artifact.subheadings) {
    const cleaned = cleanHeading(sub.title);
    const key = cleaned.toLowerCase();
    if (!cleaned || seen.has(key)) continue;
    seen.add(key);
    subheadings.push({ ...sub, title: cleaned });
  }

  const problems: string[] = [];
  if (!title) problems.push("title is empty");
  if (!description) problems.push("description is empty");
  if (subheadings.length < min || subheadings.length > max) {
    problems.push(`${subheadings.length} usable subheadings, expected ${min}-${max}`);
  }

  if (problems.length > 0) {
    logger.warn({ sourcePath: context.note.sourcePath, problems }, "Outline rejected");
    return fatal(validationFailure("outline is unusable", problems));
  }

  const dropped = artifact.subheadings.length - subheadings.length;
  if (dropped > 0) {
    logger.info({ dropped }, "Dropped empty or duplicate subheadings");
  }

  return success({ ...artifact, title, description, subheadings });
}
