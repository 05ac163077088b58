import type { CompletedArtifact } from "@notes-to-blog/core";

export function makeCompletedArtifact(overrides: Partial<CompletedArtifact> = {}): CompletedArtifact {
  const header = {
    kind: "header" as const,
    prompt: "header prompt",
    filePath: "/site/images/tips-header.png",
    altText: "Tips for Home Composting",
  };
  const section = {
    kind: "section" as const,
    prompt: "section prompt",
    filePath: "/site/images/tips-1.png",
    altText: "Choosing a Bin",
  };

  return {
    title: "Tips for Home Composting",
    description: 'Turn "kitchen" scraps into gold.',
    subheadings: [
      { title: "Choosing a Bin", sources: [], body: "Pick a bin with a lid.\n", image: section },
      { title: "Troubleshooting Smells", sources: [], body: "Add more browns." },
    ],
    introduction: "Compost is easy to start.",
    conclusion: "Start your pile today.",
    category: "home",
    tags: ["compost", "garden"],
    images: [header, section],
    frontmatter: {
      title: "Tips for Home Composting",
      description: 'Turn "kitchen" scraps into gold.',
      date: "2024-05-01",
      draft: true,
      categories: ["home"],
      tags: ["compost", "garden"],
      featuredImage: header.filePath,
    },
    filename: "tips-for-home-composting.md",
    ...overrides,
  };
}
