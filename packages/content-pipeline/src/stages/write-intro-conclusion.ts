import { createChildLogger, type WorkflowArtifact } from "@notes-to-blog/core";
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

const logger = createChildLogger({ module: "pipeline:intro-conclusion" });

/**
 * Intro/Conclusion Stage: one LLM call for each. An introduction written
 * by an earlier attempt is kept.
 */
export async function runWriteIntroConclusionStage(
  artifact: WorkflowArtifact,
  context: StageContext
): Promise<StageResult> {
  const { note, config } = context;
  logger.info({ sourcePath: note.sourcePath, attempt: context.attempt }, "Starting intro/conclusion stage");

  const llm = await requireLlm(context.registry);
  if (isStageFailure(llm)) return llm;

  const outline = outlineBlock(artifact);
  const research = artifact.subheadings
    .map((s) => `## ${s.title}\n${researchBlock(s)}`)
    .join("\n\n");
  const system = `You are a blog writer. ${WRITING_RULES}`;
  let cost = 0;
  let current = artifact;

  if (!current.introduction) {
    const intro = await completeText(
      llm,
      `${outline}

NOTES:
${note.content}

RESEARCH:
${research}${guidanceBlock(context.guidance)}

Write the introduction (2-3 short paragraphs). Open with a hook, then tell the reader what the post covers.`,
      callOptions(config, { system })
    );
    if (!intro.ok) return llmFailure(intro.error, "introduction failed");
    cost += intro.value.cost;
    current = { ...current, introduction: intro.value.text };
  }

  const conclusion = await completeText(
    llm,
    `${outline}

INTRODUCTION:
${current.introduction ?? ""}${guidanceBlock(context.guidance)}

Write the conclusion (1-2 short paragraphs). Summarize the key takeaways and end with a clear next step for the reader.`,
    callOptions(config, { system })
  );
  if (!conclusion.ok) {
    const failure = llmFailure(conclusion.error, "conclusion failed");
    return failure.status === "recoverable" ? { ...failure, partial: current } : failure;
  }
  cost += conclusion.value.cost;

  logger.info({ sourcePath: note.sourcePath, cost }, "Intro/conclusion stage complete");

  return success({ ...current, conclusion: conclusion.value.text }, cost);
}
