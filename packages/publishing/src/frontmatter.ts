import type { Frontmatter } from "@notes-to-blog/core";

export function escapeTomlString(text: string): string {
  return text
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\n/g, "\\n")
    .replace(/\r/g, "\\r")
    .replace(/\t/g, "\\t");
}

export function tomlArray(items: readonly string[]): string {
  return `[${items.map((item) => `"${escapeTomlString(item)}"`).join(", ")}]`;
}

/**
 * Build TOML front matter for a Zola-style post, delimited by `+++`.
 */
export function renderFrontmatter(
  frontmatter: Frontmatter,
  options: { draft?: boolean; featuredImage?: string } = {}
): string {
  const featuredImage = options.featuredImage ?? frontmatter.featuredImage;
  const lines = [
    "+++",
    `title = "${escapeTomlString(frontmatter.title)}"`,
    `description = "${escapeTomlString(frontmatter.description)}"`,
    `date = "${frontmatter.date}"`,
    `draft = ${options.draft ?? frontmatter.draft}`,
    "",
    "[taxonomies]",
    `categories = ${tomlArray(frontmatter.categories)}`,
    `tags = ${tomlArray(frontmatter.tags)}`,
  ];

  if (featuredImage) {
    lines.push("", "[extra]", `featured_image = "${escapeTomlString(featuredImage)}"`);
  }

  lines.push("+++");
  return lines.join("\n");
}
