export { logger, createChildLogger, type Logger } from "./logger.js";
export { env, requireEnv, optionalEnv } from "./env.js";
export { loadAppConfig, parseAppConfig, getConfigPath } from "./config.js";
export * from "./schemas/index.js";
export * from "./failures.js";
export { slugify } from "./slug.js";
export { mapWithConcurrency, sleep } from "./concurrency.js";
