import { describe, it, expect } from "vitest";
import { escapeTomlString, renderFrontmatter, tomlArray } from "../frontmatter.js";
import { makeCompletedArtifact } from "./fixtures.js";

describe("escapeTomlString", () => {
  it("escapes backslashes, quotes and control characters", () => {
    expect(escapeTomlString('a\\b "c"\nd\te')).toBe(String.raw`a\\b \"c\"\nd\te`);
  });
});

describe("tomlArray", () => {
  it("renders quoted items", () => {
    expect(tomlArray(["home", 'say "hi"'])).toBe(String.raw`["home", "say \"hi\""]`);
  });

  it("renders an empty array", () => {
    expect(tomlArray([])).toBe("[]");
  });
});

describe("renderFrontmatter", () => {
  it("renders taxonomies and the featured image", () => {
    const { frontmatter } = makeCompletedArtifact();

    expect(renderFrontmatter(frontmatter).split("\n")).toEqual([
      "+++",
      'title = "Tips for Home Composting"',
      String.raw`description = "Turn \"kitchen\" scraps into gold."`,
      'date = "2024-05-01"',
      "draft = true",
      "",
      "[taxonomies]",
      'categories = ["home"]',
      'tags = ["compost", "garden"]',
      "",
      "[extra]",
      'featured_image = "/site/images/tips-header.png"',
      "+++",
    ]);
  });

  it("omits the extra table without an image and honours the draft override", () => {
    const { featuredImage: _unused, ...frontmatter } = makeCompletedArtifact().frontmatter;

    const rendered = renderFrontmatter(frontmatter, { draft: false });

    expect(rendered).toContain("draft = false");
    expect(rendered).not.toContain("[extra]");
    expect(rendered.endsWith('tags = ["compost", "garden"]\n+++')).toBe(true);
  });
});
