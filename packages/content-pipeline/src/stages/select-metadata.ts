import { z } from "zod";
import {
  createChildLogger,
  slugify,
  type PendingFrontmatter,
  type WorkflowArtifact,
} from "@notes-to-blog/core";
import {
  callOptions,
  completeJson,
  guidanceBlock,
  isStageFailure,
  llmFailure,
  requireLlm,
} from "../llm.js";
import { success, type StageContext, type StageResult } from "../types.js";

const logger = createChildLogger({ module: "pipeline:metadata" });

export const FALLBACK_FILENAME = "untitled-post";

const MetadataSchema = z.object({
  category: z.string(),
  // Tags sometimes come back as one comma-separated string
  tags: z.union([z.array(z.string()), z.string().transform((s) => s.split(","))]),
});

/** Trim, lowercase and dedupe, keeping first-seen order. */
export function normalizeTags(tags: string[]): string[] {
  const seen = new Set<string>();
  for (const tag of tags) {
    const cleaned = tag.trim().toLowerCase().replace(/\s+/g, " ");
    if (cleaned) seen.add(cleaned);
  }
  return [...seen];
}

export function postFilename(title: string): string {
  return `${slugify(title) || FALLBACK_FILENAME}.md`;
}

export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Metadata Stage: pick a category and tags, then assemble frontmatter and
 * the output filename. Whether the category is allowed is decided by the
 * orchestrator's gate, not here.
 */
export async function runSelectMetadataStage(
  artifact: WorkflowArtifact,
  context: StageContext
): Promise<StageResult> {
  const { note, config } = context;
  const [minTags, maxTags] = config.tagCountRange;
  const title = artifact.title ?? "";

  logger.info({ sourcePath: note.sourcePath, attempt: context.attempt }, "Starting metadata stage");

  const llm = await requireLlm(context.registry);
  if (isStageFailure(llm)) return llm;

  const system = `You are an editor classifying blog posts.

Pick exactly one category from this list: ${config.categories.join(", ")}
Pick between ${minTags} and ${maxTags} short, lowercase tags.

Respond with JSON:
{
  "category": "one of the categories",
  "tags": ["tag one", "tag two"]
}`;

  const prompt = `TITLE: ${title}
DESCRIPTION: ${artifact.description ?? ""}
SUBHEADINGS: ${artifact.subheadings.map((s) => s.title).join("; ")}

INTRODUCTION:
${artifact.introduction ?? ""}${guidanceBlock(context.guidance)}

Classify this post as JSON.`;

  const result = await completeJson(llm, prompt, MetadataSchema, callOptions(config, { system, temperature: 0.2 }));
  if (!result.ok) return llmFailure(result.error, "metadata selection failed");

  const { data, cost } = result.value;
  const category = data.category.trim().toLowerCase();
  const tags = normalizeTags(data.tags);
  const header = artifact.images.find((img) => img.kind === "header");

  const frontmatter: PendingFrontmatter = {
    title,
    description: artifact.description ?? "",
    date: formatDate(context.now()),
    draft: true,
    categories: [category],
    tags,
    ...(header ? { featuredImage: header.filePath } : {}),
  };

  logger.info({ sourcePath: note.sourcePath, category, tags }, "Metadata stage complete");

  return success(
    { ...artifact, category, tags, frontmatter, filename: postFilename(title) },
    cost
  );
}
