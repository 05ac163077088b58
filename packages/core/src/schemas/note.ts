import { z } from "zod";

export const NoteFormatSchema = z.enum(["markdown", "plaintext"]);

export type NoteFormat = z.infer<typeof NoteFormatSchema>;

export const NoteSchema = z.object({
  content: z
    .string()
    .trim()
    .min(10, "Note content must be at least 10 characters long"),
  sourcePath: z.string().min(1),
  format: NoteFormatSchema,
  title: z.string().trim().min(1).optional(),
});

export type Note = z.infer<typeof NoteSchema>;
