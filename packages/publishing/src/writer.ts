import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join, relative, sep } from "node:path";
import { createChildLogger, type CompletedArtifact } from "@notes-to-blog/core";
import { DEFAULT_TEMPLATE, renderBlogPost } from "./render.js";

const logger = createChildLogger({ module: "publishing:writer" });

const INVALID_FILENAME = /[<>:"|?*/\\]/;

export class OutputExistsError extends Error {
  constructor(public readonly filePath: string) {
    super(`${filePath} already exists; pass overwrite to replace it`);
    this.name = "OutputExistsError";
  }
}

export interface WriteOptions {
  template?: string;
  overwrite?: boolean;
  draft?: boolean;
}

export interface WrittenPost {
  filePath: string;
  bytes: number;
}

export function validateFilename(filename: string): string | undefined {
  if (!filename.endsWith(".md")) return `filename "${filename}" must end in .md`;
  if (filename.length <= ".md".length) return "filename is empty";
  if (INVALID_FILENAME.test(filename)) return `filename "${filename}" contains invalid characters`;
  return undefined;
}

/** Image path as seen from the post, with forward slashes. */
export function relativeImagePath(outputDir: string, filePath: string): string {
  return relative(outputDir, filePath).split(sep).join("/");
}

/**
 * Render and write the post to `outputDir/<filename>`. An existing file
 * is only replaced when `overwrite` is set.
 */
export async function writeBlogPost(
  artifact: CompletedArtifact,
  outputDir: string,
  options: WriteOptions = {}
): Promise<WrittenPost> {
  const problem = validateFilename(artifact.filename);
  if (problem) throw new Error(problem);

  const filePath = join(outputDir, artifact.filename);
  const content = renderBlogPost(artifact, {
    template: options.template ?? DEFAULT_TEMPLATE,
    ...(options.draft === undefined ? {} : { draft: options.draft }),
    imagePath: (path) => relativeImagePath(dirname(filePath), path),
  });

  await mkdir(outputDir, { recursive: true });
  try {
    await writeFile(filePath, content, { encoding: "utf-8", flag: options.overwrite ? "w" : "wx" });
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "EEXIST") {
      throw new OutputExistsError(filePath);
    }
    throw err;
  }

  const bytes = Buffer.byteLength(content, "utf-8");
  logger.info({ filePath, bytes }, "Blog post written");
  return { filePath, bytes };
}
