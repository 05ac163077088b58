import type { Dirent } from "node:fs";
import { mkdir, readdir, readFile, rename, stat } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import {
  createChildLogger,
  errorMessage,
  NoteSchema,
  type Note,
  type NoteFormat,
} from "@notes-to-blog/core";

const logger = createChildLogger({ module: "ingestion" });

const EXTENSION_FORMATS: Record<string, NoteFormat> = {
  ".md": "markdown",
  ".markdown": "markdown",
  ".txt": "plaintext",
};

export const SUPPORTED_EXTENSIONS = Object.keys(EXTENSION_FORMATS);

export const MAX_NOTE_BYTES = 10 * 1024 * 1024;

export const PROCESSED_DIR = "processed";

export class NoteReadError extends Error {
  constructor(
    readonly path: string,
    readonly reason: string
  ) {
    super(`${path}: ${reason}`);
    this.name = "NoteReadError";
  }
}

export function noteFormat(path: string): NoteFormat | undefined {
  return EXTENSION_FORMATS[extname(path).toLowerCase()];
}

function isNoteFileName(name: string): boolean {
  return !name.startsWith(".") && noteFormat(name) !== undefined;
}

/** First `# ` heading of a markdown note. */
export function extractTitle(content: string): string | undefined {
  const match = /^#[ \t]+(.+?)[ \t#]*$/m.exec(content);
  return match ? match[1].trim() : undefined;
}

/** Entries of `dir`, or `undefined` when it does not exist. */
async function readDirIfExists(dir: string): Promise<Dirent[] | undefined> {
  try {
    return await readdir(dir, { withFileTypes: true });
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return undefined;
    throw err;
  }
}

/**
 * Supported note files directly inside `dir`, sorted by name. Hidden
 * files and subdirectories are skipped; a missing directory has no notes.
 */
export async function listNoteFiles(dir: string): Promise<string[]> {
  const entries = await readDirIfExists(dir);
  if (!entries) {
    logger.warn({ dir }, "Inbox directory does not exist");
    return [];
  }

  return entries
    .filter((entry) => entry.isFile() && isNoteFileName(entry.name))
    .map((entry) => entry.name)
    .sort((a, b) => a.localeCompare(b))
    .map((name) => join(dir, name));
}

/**
 * Read and validate one note file.
 * @throws NoteReadError when the file is unsupported, too large, or too short
 */
export async function readNote(path: string): Promise<Note> {
  const format = noteFormat(path);
  if (!format) {
    throw new NoteReadError(path, `unsupported file extension "${extname(path)}"`);
  }

  const info = await stat(path);
  if (info.size > MAX_NOTE_BYTES) {
    throw new NoteReadError(path, "file is larger than 10MB");
  }

  const content = await readFile(path, "utf-8");
  const title = format === "markdown" ? extractTitle(content) : undefined;

  const parsed = NoteSchema.safeParse({
    content,
    sourcePath: path,
    format,
    ...(title ? { title } : {}),
  });
  if (!parsed.success) {
    throw new NoteReadError(path, parsed.error.issues.map((i) => i.message).join("; "));
  }
  return parsed.data;
}

export interface SkippedNote {
  path: string;
  reason: string;
}

export interface LoadedNotes {
  notes: Note[];
  skipped: SkippedNote[];
}

/**
 * Load every note in `dir`. Files that fail to load are reported in
 * `skipped` and never stop the rest.
 */
export async function loadNotes(dir: string): Promise<LoadedNotes> {
  const notes: Note[] = [];
  const skipped: SkippedNote[] = [];

  for (const path of await listNoteFiles(dir)) {
    try {
      notes.push(await readNote(path));
    } catch (err) {
      const reason = err instanceof NoteReadError ? err.reason : errorMessage(err);
      logger.warn({ path, reason }, "Skipping note");
      skipped.push({ path, reason });
    }
  }

  logger.info({ dir, loaded: notes.length, skipped: skipped.length }, "Notes loaded");
  return { notes, skipped };
}

export interface InboxStatus {
  inboxDir: string;
  exists: boolean;
  totalFiles: number;
  supportedFiles: number;
  unsupportedFiles: number;
}

export async function getInboxStatus(dir: string): Promise<InboxStatus> {
  const entries = await readDirIfExists(dir);
  if (!entries) {
    return { inboxDir: dir, exists: false, totalFiles: 0, supportedFiles: 0, unsupportedFiles: 0 };
  }

  const files = entries.filter((e) => e.isFile() && !e.name.startsWith("."));
  const supported = files.filter((e) => isNoteFileName(e.name)).length;
  return {
    inboxDir: dir,
    exists: true,
    totalFiles: files.length,
    supportedFiles: supported,
    unsupportedFiles: files.length - supported,
  };
}

/**
 * Move a processed note into `<inboxDir>/processed/` and return its new path.
 */
export async function archiveNote(path: string, inboxDir: string): Promise<string> {
  const target = join(inboxDir, PROCESSED_DIR);
  await mkdir(target, { recursive: true });
  const destination = join(target, basename(path));
  await rename(path, destination);
  logger.info({ from: path, to: destination }, "Archived note");
  return destination;
}
