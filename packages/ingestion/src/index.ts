export {
  listNoteFiles,
  readNote,
  loadNotes,
  getInboxStatus,
  archiveNote,
  extractTitle,
  noteFormat,
  NoteReadError,
  SUPPORTED_EXTENSIONS,
  MAX_NOTE_BYTES,
  PROCESSED_DIR,
  type LoadedNotes,
  type SkippedNote,
  type InboxStatus,
} from "./notes.js";
