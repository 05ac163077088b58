import type { CompletedArtifact } from "@notes-to-blog/core";

const WORDS_PER_MINUTE = 200;

/** Words in markdown text, ignoring image syntax, link targets and markup characters. */
export function countWords(markdown: string): number {
  const text = markdown
    .replace(/!\[[^\]]*\]\([^)]*\)/g, " ")
    .replace(/\[([^\]]*)\]\([^)]*\)/g, "$1")
    .replace(/[#*_>`~|-]+/g, " ");
  return text.split(/\s+/).filter(Boolean).length;
}

export function readingTimeMinutes(words: number, wordsPerMinute = WORDS_PER_MINUTE): number {
  return Math.max(1, Math.ceil(words / wordsPerMinute));
}

export interface PostStats {
  words: number;
  readingMinutes: number;
  sections: number;
  images: number;
}

export function postStats(artifact: CompletedArtifact): PostStats {
  const words = countWords(
    [artifact.introduction, ...artifact.subheadings.map((s) => s.body), artifact.conclusion].join("\n\n")
  );
  return {
    words,
    readingMinutes: readingTimeMinutes(words),
    sections: artifact.subheadings.length,
    images: artifact.images.length,
  };
}
