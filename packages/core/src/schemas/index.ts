export * from "./note.js";
export * from "./artifact.js";
export * from "./config.js";
