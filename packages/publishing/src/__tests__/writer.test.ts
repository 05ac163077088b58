import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { OutputExistsError, validateFilename, writeBlogPost } from "../writer.js";
import { FileImageStore } from "../image-store.js";
import { makeCompletedArtifact } from "./fixtures.js";

describe("writeBlogPost", () => {
  let dir: string;
  let outputDir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "ntb-output-"));
    outputDir = join(dir, "output");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function artifactWithLocalImages() {
    const header = {
      kind: "header" as const,
      prompt: "header prompt",
      filePath: join(dir, "images", "tips-header.png"),
      altText: "Tips for Home Composting",
    };
    const base = makeCompletedArtifact();
    return makeCompletedArtifact({
      images: [header],
      subheadings: base.subheadings.map(({ image: _image, ...sub }) => sub),
      frontmatter: { ...base.frontmatter, featuredImage: header.filePath },
    });
  }

  it("writes the post with image paths relative to the output directory", async () => {
    const written = await writeBlogPost(artifactWithLocalImages(), outputDir);

    expect(written.filePath).toBe(join(outputDir, "tips-for-home-composting.md"));
    const content = await readFile(written.filePath, "utf-8");
    expect(written.bytes).toBe(Buffer.byteLength(content, "utf-8"));
    expect(content).toContain('\nfeatured_image = "../images/tips-header.png"\n');
    expect(content).toContain("\n![Tips for Home Composting](../images/tips-header.png)\n");
  });

  it("refuses to replace an existing post unless asked", async () => {
    const artifact = artifactWithLocalImages();
    await writeBlogPost(artifact, outputDir);

    await expect(writeBlogPost(artifact, outputDir, { template: "changed" })).rejects.toBeInstanceOf(
      OutputExistsError
    );

    await writeBlogPost(artifact, outputDir, { template: "changed", overwrite: true });
    expect(await readFile(join(outputDir, artifact.filename), "utf-8")).toBe("changed\n");
  });

  it("rejects unusable filenames", async () => {
    await expect(
      writeBlogPost(makeCompletedArtifact({ filename: "what?.md" }), outputDir)
    ).rejects.toThrow('filename "what?.md" contains invalid characters');
  });
});

describe("validateFilename", () => {
  it.each([
    ["post.md", undefined],
    ["post.txt", 'filename "post.txt" must end in .md'],
    [".md", "filename is empty"],
    ["a/b.md", 'filename "a/b.md" contains invalid characters'],
  ])("%s", (filename, expected) => {
    expect(validateFilename(filename)).toBe(expected);
  });
});

describe("FileImageStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "ntb-images-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes the payload under the images directory", async () => {
    const store = new FileImageStore(join(dir, "images"));

    const path = await store.save(
      { data: Uint8Array.from([1, 2, 3]), mimeType: "image/png", extension: "png", model: "test-model" },
      "post-header"
    );

    expect(path).toBe(join(dir, "images", "post-header.png"));
    expect(await readFile(path)).toEqual(Buffer.from([1, 2, 3]));
  });

  it("never replaces an image saved under the same name", async () => {
    const store = new FileImageStore(join(dir, "images"));
    const payload = (byte: number) => ({
      data: Uint8Array.from([byte]),
      mimeType: "image/png",
      extension: "png",
      model: "test-model",
    });

    const first = await store.save(payload(1), "tips-for-home-composting-header");
    const second = await store.save(payload(2), "tips-for-home-composting-header");
    const third = await store.save(payload(3), "tips-for-home-composting-header");

    expect(first).toBe(join(dir, "images", "tips-for-home-composting-header.png"));
    expect(second).toBe(join(dir, "images", "tips-for-home-composting-header-2.png"));
    expect(third).toBe(join(dir, "images", "tips-for-home-composting-header-3.png"));
    expect(await readFile(first)).toEqual(Buffer.from([1]));
    expect(await readFile(second)).toEqual(Buffer.from([2]));
  });
});
