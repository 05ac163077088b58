import { createChildLogger, type Subheading, type WorkflowArtifact } from "@notes-to-blog/core";
import {
  callOptions,
  completeText,
  guidanceBlock,
  isStageFailure,
  llmFailure,
  requireLlm,
} from "../llm.js";
import { success, type StageContext, type StageResult } from "../types.js";
import { outlineBlock, researchBlock, WRITING_RULES } from "./shared.js";

const logger = createChildLogger({ module: "pipeline:subheadings" });

/**
 * Subheadings Stage: write each section body in outline order. Bodies
 * written before a failure are handed back as partial progress so the
 * retry only writes what is missing.
 */
export async function runWriteSubheadingsStage(
  artifact: WorkflowArtifact,
  context: StageContext
): Promise<StageResult> {
  const { note, config } = context;
  const pending = artifact.subheadings.filter((s) => !s.body).length;
  logger.info({ sourcePath: note.sourcePath, attempt: context.attempt, pending }, "Starting subheadings stage");

  const llm = await requireLlm(context.registry);
  if (isStageFailure(llm)) return llm;

  const system = `You are a blog writer. ${WRITING_RULES}`;
  const outline = outlineBlock(artifact);
  const subheadings: Subheading[] = [...artifact.subheadings];
  let cost = 0;

  for (const [index, sub] of subheadings.entries()) {
    if (sub.body) continue;

    const previous = index > 0 ? `The previous section was "${subheadings[index - 1].title}".\n` : "";
    const result = await completeText(
      llm,
      `${outline}

NOTES:
${note.content}

RESEARCH FOR THIS SECTION:
${researchBlock(sub)}

${previous}Write the body of the section "${sub.title}" (2-4 paragraphs). Do not repeat the heading.${guidanceBlock(context.guidance)}`,
      callOptions(config, { system })
    );

    if (!result.ok) {
      const failure = llmFailure(result.error, `section "${sub.title}" failed`);
      return failure.status === "recoverable"
        ? { ...failure, partial: { ...artifact, subheadings } }
        : failure;
    }

    cost += result.value.cost;
    subheadings[index] = { ...sub, body: result.value.text };
    logger.debug({ subheading: sub.title, length: result.value.text.length }, "Section written");
  }

  logger.info({ sourcePath: note.sourcePath, written: pending, cost }, "Subheadings stage complete");

  return success({ ...artifact, subheadings }, cost);
}
