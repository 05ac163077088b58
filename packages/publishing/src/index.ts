export { escapeTomlString, tomlArray, renderFrontmatter } from "./frontmatter.js";
export {
  DEFAULT_TEMPLATE,
  TEMPLATE_FILE,
  loadTemplate,
  renderBlogPost,
  renderSections,
  type RenderOptions,
} from "./render.js";
export {
  OutputExistsError,
  relativeImagePath,
  validateFilename,
  writeBlogPost,
  type WriteOptions,
  type WrittenPost,
} from "./writer.js";
export { FileImageStore } from "./image-store.js";
export { countWords, postStats, readingTimeMinutes, type PostStats } from "./reading-time.js";
