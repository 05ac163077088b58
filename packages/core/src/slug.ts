/**
 * Filesystem- and URL-safe slug: lowercase, whitespace to hyphens,
 * everything else that is not [a-z0-9-] dropped.
 */
export function slugify(text: string, maxLength = 80): string {
  return text
    .toLowerCase()
    .replace(/\s+/g, "-")
    .replace(/[^a-z0-9-]/g, "")
    .replace(/-+/g, "-")
    .replace(/^-|-$/g, "")
    .slice(0, maxLength)
    .replace(/-$/, "");
}
