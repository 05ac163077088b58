import {
  capabilityFailure,
  createChildLogger,
  slugify,
  sleep,
  unavailableDependency,
  type GeneratedImage,
  type Subheading,
  type WorkflowArtifact,
} from "@notes-to-blog/core";
import type { CapabilityError, ImageClient, ImagePayload } from "@notes-to-blog/services";
import { fatal, success, type StageContext, type StageResult } from "../types.js";

const logger = createChildLogger({ module: "pipeline:illustrate" });

const STYLE = "Clean editorial illustration, soft natural lighting, cohesive muted palette, no text or lettering";

export function headerImagePrompt(title: string, description: string): string {
  return `Blog header image for "${title}". ${description} ${STYLE}.`;
}

export function sectionImagePrompt(title: string, subheading: string): string {
  return `Illustration for the section "${subheading}" of a blog post titled "${title}". ${STYLE}.`;
}

type Generated = { ok: true; payload: ImagePayload } | { ok: false; error: CapabilityError };

/** Per-image retry budget; a missing or rejected provider is not retried. */
async function generateWithRetries(
  image: ImageClient,
  prompt: string,
  context: StageContext
): Promise<Generated> {
  const { config } = context;
  const maxAttempts = config.maxRetriesPerStage + 1;
  let lastError: CapabilityError = { kind: "unavailable", message: "no attempt made" };

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const result = await image.generate(prompt, config.imageDimensions, {
      timeoutMs: config.perStageTimeoutMs,
    });
    if (result.ok) return { ok: true, payload: result.value };

    lastError = result.error;
    if (lastError.kind === "auth" || lastError.kind === "unavailable") break;
    if (attempt < maxAttempts) {
      await sleep(config.retryBackoffMs * 2 ** (attempt - 1));
    }
  }
  return { ok: false, error: lastError };
}

/**
 * Illustrate Stage: one header image plus one image per subheading.
 * Prompts are derived from the outline alone, so reruns ask for the same
 * pictures. A section without an image is acceptable; a post without a
 * header image is not.
 */
export async function runIllustrateStage(
  artifact: WorkflowArtifact,
  context: StageContext
): Promise<StageResult> {
  const { registry, imageStore, note } = context;
  const title = artifact.title ?? "";
  const baseName = slugify(title) || "post";

  const status = await registry.status("image");
  if (status.state === "unavailable") {
    logger.warn({ sourcePath: note.sourcePath, detail: status.detail }, "Image capability unavailable");
    return fatal(unavailableDependency("image"));
  }

  const image = registry.get("image");
  logger.info({ sourcePath: note.sourcePath, subheadingCount: artifact.subheadings.length }, "Starting illustrate stage");

  let header = artifact.images.find((img) => img.kind === "header");
  if (!header) {
    const prompt = headerImagePrompt(title, artifact.description ?? "");
    const generated = await generateWithRetries(image, prompt, context);
    if (!generated.ok) {
      return fatal(capabilityFailure(`header image generation failed: ${generated.error.message}`));
    }
    header = {
      kind: "header",
      prompt,
      filePath: await imageStore.save(generated.payload, `${baseName}-header`),
      altText: `Header image for ${title}`,
    };
  }

  const subheadings: Subheading[] = [];
  for (const [index, sub] of artifact.subheadings.entries()) {
    if (sub.image) {
      subheadings.push(sub);
      continue;
    }

    const prompt = sectionImagePrompt(title, sub.title);
    const generated = await generateWithRetries(image, prompt, context);
    if (!generated.ok) {
      logger.warn(
        { subheading: sub.title, kind: generated.error.kind, error: generated.error.message },
        "Section image failed, continuing without it"
      );
      subheadings.push(sub);
      continue;
    }

    const sectionImage: GeneratedImage = {
      kind: "section",
      prompt,
      filePath: await imageStore.save(generated.payload, `${baseName}-${index + 1}`),
      altText: sub.title,
    };
    subheadings.push({ ...sub, image: sectionImage });
  }

  const sectionImages = subheadings.flatMap((s) => (s.image ? [s.image] : []));
  logger.info(
    { sourcePath: note.sourcePath, sectionImages: sectionImages.length },
    "Illustrate stage complete"
  );

  return success({ ...artifact, subheadings, images: [header, ...sectionImages] });
}
