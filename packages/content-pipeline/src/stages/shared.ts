import type { Subheading, WorkflowArtifact } from "@notes-to-blog/core";

export const WRITING_RULES = `WRITING RULES:
- Write in markdown, without headings (the post template adds them)
- Only state facts found in the notes or the research; do not invent statistics or quotes
- Vary sentence and paragraph length
- Use contractions naturally
- Write like you're talking to a friend who's smart but not an expert`;

export function outlineBlock(artifact: WorkflowArtifact): string {
  return `TITLE: ${artifact.title ?? ""}
DESCRIPTION: ${artifact.description ?? ""}
SUBHEADINGS:
${artifact.subheadings.map((s, i) => `${i + 1}. ${s.title}`).join("\n")}`;
}

export function researchBlock(sub: Subheading): string {
  return sub.researchNotes ? sub.researchNotes : "(no research available; rely on the notes)";
}
