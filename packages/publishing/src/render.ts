import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { createChildLogger, type CompletedArtifact, type GeneratedImage } from "@notes-to-blog/core";
import { renderFrontmatter } from "./frontmatter.js";

const logger = createChildLogger({ module: "publishing:render" });

export const TEMPLATE_FILE = "blog-post.md";

export const DEFAULT_TEMPLATE = `{{frontmatter}}

{{header_image}}

{{introduction}}

{{sections}}

## Conclusion

{{conclusion}}
`;

/**
 * The post template from `templatesDir`, or the built-in one when the
 * directory has none.
 */
export async function loadTemplate(templatesDir: string): Promise<string> {
  const path = join(templatesDir, TEMPLATE_FILE);
  try {
    return await readFile(path, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      logger.debug({ path }, "No template file, using the built-in template");
      return DEFAULT_TEMPLATE;
    }
    throw err;
  }
}

export interface RenderOptions {
  template?: string;
  /** Overrides the frontmatter's draft flag. */
  draft?: boolean;
  /** Maps a stored image path to the path written into the post. */
  imagePath?: (filePath: string) => string;
}

function imageMarkdown(image: GeneratedImage, imagePath: (filePath: string) => string): string {
  const alt = image.altText.replace(/[[\]]/g, "");
  return `![${alt}](${imagePath(image.filePath)})`;
}

export function renderSections(
  artifact: CompletedArtifact,
  imagePath: (filePath: string) => string = (p) => p
): string {
  return artifact.subheadings
    .map((sub) => {
      const parts = [`## ${sub.title}`];
      if (sub.image) parts.push(imageMarkdown(sub.image, imagePath));
      parts.push(sub.body.trim());
      return parts.join("\n\n");
    })
    .join("\n\n");
}

// A slot alone on its line, plus the blank lines after it
const SLOT_LINE = /^[ \t]*\{\{(\w+)\}\}[ \t]*\n(?:[ \t]*\n)*/gm;
const SLOT = /\{\{(\w+)\}\}/g;

/**
 * Render the finished post. Unknown placeholders are left as they are;
 * an empty slot on its own line is removed with the blank lines after it.
 * Content inside the slots is inserted untouched.
 */
export function renderBlogPost(artifact: CompletedArtifact, options: RenderOptions = {}): string {
  const imagePath = options.imagePath ?? ((p: string) => p);
  const header = artifact.images.find((img) => img.kind === "header");

  const values = new Map<string, string>([
    [
      "frontmatter",
      renderFrontmatter(artifact.frontmatter, {
        ...(options.draft === undefined ? {} : { draft: options.draft }),
        ...(artifact.frontmatter.featuredImage
          ? { featuredImage: imagePath(artifact.frontmatter.featuredImage) }
          : {}),
      }),
    ],
    ["header_image", header ? imageMarkdown(header, imagePath) : ""],
    ["introduction", artifact.introduction.trim()],
    ["sections", renderSections(artifact, imagePath)],
    ["conclusion", artifact.conclusion.trim()],
  ]);

  const rendered = (options.template ?? DEFAULT_TEMPLATE)
    .replace(SLOT_LINE, (line: string, key: string) => (values.get(key) === "" ? "" : line))
    .replace(SLOT, (placeholder: string, key: string) => values.get(key) ?? placeholder);

  return `${rendered.trim()}\n`;
}
