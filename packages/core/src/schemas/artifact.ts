import { z } from "zod";

// ─── Categories ─────────────────────────────────────────────────────────────

export const CATEGORIES = [
  "development",
  "computer",
  "home",
  "ai",
  "business",
  "crafting",
  "health",
  "diy",
  "recipes",
] as const;

export const CategorySchema = z.enum(CATEGORIES);

export type Category = z.infer<typeof CategorySchema>;

export function isCategory(value: string): value is Category {
  return CategorySchema.safeParse(value).success;
}

// ─── Images ─────────────────────────────────────────────────────────────────

export const GeneratedImageSchema = z.object({
  kind: z.enum(["header", "section"]),
  prompt: z.string().min(1),
  filePath: z.string().min(1),
  altText: z.string().min(1),
});

export type GeneratedImage = z.infer<typeof GeneratedImageSchema>;

// ─── Subheadings ────────────────────────────────────────────────────────────

export const SourceLinkSchema = z.object({
  title: z.string(),
  url: z.string(),
});

export type SourceLink = z.infer<typeof SourceLinkSchema>;

export const SubheadingSchema = z.object({
  title: z.string().min(1),
  researchNotes: z.string().optional(),
  sources: z.array(SourceLinkSchema).default([]),
  body: z.string().optional(),
  image: GeneratedImageSchema.optional(),
});

export type Subheading = z.infer<typeof SubheadingSchema>;

// ─── Frontmatter ────────────────────────────────────────────────────────────

export const FrontmatterSchema = z.object({
  title: z.string().min(1),
  description: z.string().min(1),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "date must be YYYY-MM-DD"),
  draft: z.boolean().default(true),
  categories: z.array(CategorySchema).min(1),
  tags: z.array(z.string().min(1)).min(1),
  featuredImage: z.string().optional(),
});

export type Frontmatter = z.infer<typeof FrontmatterSchema>;

/** Frontmatter as assembled during metadata selection, before the category gate. */
export const PendingFrontmatterSchema = FrontmatterSchema.extend({
  categories: z.array(z.string().min(1)).min(1),
});

export type PendingFrontmatter = z.infer<typeof PendingFrontmatterSchema>;

// ─── Workflow Artifact ──────────────────────────────────────────────────────

/**
 * The blog post under construction. Every stage receives the previous
 * artifact and returns a new one; fields only ever get added or refined.
 */
export const WorkflowArtifactSchema = z.object({
  title: z.string().optional(),
  description: z.string().optional(),
  subheadings: z.array(SubheadingSchema).default([]),
  introduction: z.string().optional(),
  conclusion: z.string().optional(),
  /** Held as proposed; the orchestrator rejects values outside the allowed set. */
  category: z.string().optional(),
  tags: z.array(z.string()).default([]),
  images: z.array(GeneratedImageSchema).default([]),
  frontmatter: PendingFrontmatterSchema.optional(),
  filename: z.string().optional(),
});

export type WorkflowArtifact = z.infer<typeof WorkflowArtifactSchema>;

export function emptyArtifact(): WorkflowArtifact {
  return { subheadings: [], tags: [], images: [] };
}

const nonEmpty = z.string().trim().min(1);

export const CompletedArtifactSchema = z.object({
  title: nonEmpty,
  description: nonEmpty,
  subheadings: z
    .array(SubheadingSchema.extend({ body: nonEmpty }))
    .min(1),
  introduction: nonEmpty,
  conclusion: nonEmpty,
  category: CategorySchema,
  tags: z.array(nonEmpty).min(1),
  images: z
    .array(GeneratedImageSchema)
    .refine((images) => images.some((img) => img.kind === "header"), {
      message: "header image is missing",
    }),
  frontmatter: FrontmatterSchema,
  filename: nonEmpty,
});

export type CompletedArtifact = z.infer<typeof CompletedArtifactSchema>;
