import { z } from "zod";
import { capabilityFailure, createChildLogger, type WorkflowArtifact } from "@notes-to-blog/core";
import {
  callOptions,
  completeJson,
  guidanceBlock,
  isStageFailure,
  llmFailure,
  requireLlm,
} from "../llm.js";
import { recoverable, success, type StageContext, type StageResult } from "../types.js";
import { usableHeadings } from "./outline-validate.js";

const logger = createChildLogger({ module: "pipeline:analyze" });

// The LLM uses different shapes for subheadings across runs: plain strings or objects.
const SubheadingEntrySchema = z.union([
  z.string(),
  z.object({ title: z.string() }).transform((s) => s.title),
  z.object({ heading: z.string() }).transform((s) => s.heading),
]);

const AnalysisSchema = z.object({
  title: z.string(),
  description: z.string(),
  subheadings: z.array(SubheadingEntrySchema),
});

/**
 * Analyze Stage: Turn raw notes into a title, a short description and
 * an ordered list of subheadings.
 */
export async function runAnalyzeStage(
  artifact: WorkflowArtifact,
  context: StageContext
): Promise<StageResult> {
  const { note, config } = context;
  const [minSubheadings, maxSubheadings] = config.subheadingCountRange;

  logger.info(
    { sourcePath: note.sourcePath, attempt: context.attempt },
    "Starting analyze stage"
  );

  const llm = await requireLlm(context.registry);
  if (isStageFailure(llm)) return llm;

  const system = `You are a content strategist turning raw notes into a blog post outline.

The outline should:
1. Have a compelling, specific title (no clickbait)
2. Have a 1-2 sentence description suitable for a meta description
3. Have between ${minSubheadings} and ${maxSubheadings} subheadings that follow a natural progression through the notes
4. Only cover topics the notes actually contain

Respond with JSON:
{
  "title": "Post title",
  "description": "One or two sentences",
  "subheadings": ["First subheading", "Second subheading"]
}`;

  const prompt = `${note.title ? `The author titled these notes "${note.title}".\n\n` : ""}NOTES:
${note.content}${guidanceBlock(context.guidance)}

Create the outline as JSON.`;

  const result = await completeJson(llm, prompt, AnalysisSchema, callOptions(config, { system }));
  if (!result.ok) return llmFailure(result.error, "analysis failed");

  const { data, cost } = result.value;
  const title = data.title.trim();
  const description = data.description.trim();

  if (!title || !description) {
    return recoverable(capabilityFailure("analysis returned an empty title or description"), {
      guidance: "Both title and description must be non-empty.",
    });
  }

  // The subheading gate counts cleaned, distinct headings
  const headings = usableHeadings(data.subheadings);

  logger.info(
    {
      sourcePath: note.sourcePath,
      title,
      subheadingCount: headings.length,
      dropped: data.subheadings.length - headings.length,
    },
    "Analyze stage complete"
  );

  return success(
    {
      ...artifact,
      title,
      description,
      subheadings: headings.map((heading) => ({ title: heading, sources: [] })),
    },
    cost
  );
}
