import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { DEFAULT_TEMPLATE, TEMPLATE_FILE, loadTemplate, renderBlogPost, renderSections } from "../render.js";
import { renderFrontmatter } from "../frontmatter.js";
import { countWords, postStats, readingTimeMinutes } from "../reading-time.js";
import { makeCompletedArtifact } from "./fixtures.js";

describe("renderSections", () => {
  it("renders sections in order with their images", () => {
    expect(renderSections(makeCompletedArtifact())).toBe(
      [
        "## Choosing a Bin",
        "",
        "![Choosing a Bin](/site/images/tips-1.png)",
        "",
        "Pick a bin with a lid.",
        "",
        "## Troubleshooting Smells",
        "",
        "Add more browns.",
      ].join("\n")
    );
  });
});

describe("renderBlogPost", () => {
  it("fills the default template", () => {
    const artifact = makeCompletedArtifact();

    expect(renderBlogPost(artifact)).toBe(
      [
        renderFrontmatter(artifact.frontmatter),
        "",
        "![Tips for Home Composting](/site/images/tips-header.png)",
        "",
        "Compost is easy to start.",
        "",
        renderSections(artifact),
        "",
        "## Conclusion",
        "",
        "Start your pile today.",
        "",
      ].join("\n")
    );
  });

  it("maps image paths and leaves unknown placeholders alone", () => {
    const rendered = renderBlogPost(makeCompletedArtifact(), {
      template: "{{header_image}}\n{{unknown}} {{conclusion}}",
      imagePath: (path) => path.replace("/site/", "/static/"),
    });

    expect(rendered).toBe(
      "![Tips for Home Composting](/static/images/tips-header.png)\n{{unknown}} Start your pile today.\n"
    );
  });

  it("leaves placeholders that name inherited object properties alone", () => {
    expect(renderBlogPost(makeCompletedArtifact(), { template: "{{constructor}} {{conclusion}}" })).toBe(
      "{{constructor}} Start your pile today.\n"
    );
  });

  it("drops an empty slot line but keeps blank lines inside section bodies", () => {
    const artifact = makeCompletedArtifact({
      images: [],
      subheadings: [{ title: "Choosing a Bin", sources: [], body: "Line one.\n\n\n\nLine two." }],
    });

    expect(renderBlogPost(artifact, { template: "{{header_image}}\n\n{{sections}}\n" })).toBe(
      "## Choosing a Bin\n\nLine one.\n\n\n\nLine two.\n"
    );
  });

  it("applies the draft override to the frontmatter", () => {
    expect(renderBlogPost(makeCompletedArtifact(), { draft: false })).toContain("\ndraft = false\n");
  });
});

describe("loadTemplate", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "ntb-templates-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("falls back to the built-in template", async () => {
    expect(await loadTemplate(join(dir, "missing"))).toBe(DEFAULT_TEMPLATE);
  });

  it("reads the template file", async () => {
    await writeFile(join(dir, TEMPLATE_FILE), "{{introduction}}");
    expect(await loadTemplate(dir)).toBe("{{introduction}}");
  });
});

describe("reading time", () => {
  it("counts words without markup", () => {
    expect(countWords("## Heading\n\n![alt text](x.png) See [the docs](https://a.b) - done **now**")).toBe(6);
  });

  it("rounds up to whole minutes with a one minute floor", () => {
    expect(readingTimeMinutes(0)).toBe(1);
    expect(readingTimeMinutes(200)).toBe(1);
    expect(readingTimeMinutes(201)).toBe(2);
    expect(readingTimeMinutes(450, 150)).toBe(3);
  });

  it("summarizes a post", () => {
    expect(postStats(makeCompletedArtifact())).toEqual({
      words: 18,
      readingMinutes: 1,
      sections: 2,
      images: 2,
    });
  });
});
