import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { AppConfigSchema, type AppConfig } from "./schemas/config.js";
import { env } from "./env.js";
import { logger } from "./logger.js";

export function getConfigPath(): string {
  return resolve(env.configPath);
}

/**
 * Validate a raw (already parsed) config object.
 * Throws with one line per zod issue so the CLI can show them as-is.
 */
export function parseAppConfig(raw: unknown, source = "config"): AppConfig {
  const result = AppConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const errors = result.error.issues.map(
      (i) => `  ${i.path.join(".")}: ${i.message}`
    );
    throw new Error(`Invalid ${source}:\n${errors.join("\n")}`);
  }
  return result.data;
}

/**
 * Load the YAML config file. A missing file means "all defaults".
 */
export async function loadAppConfig(path?: string): Promise<AppConfig> {
  const configPath = path ? resolve(path) : getConfigPath();

  logger.debug({ configPath }, "Loading app config");

  let raw: string;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (err) {
    if (isNotFound(err)) {
      logger.debug({ configPath }, "No config file found, using defaults");
      return parseAppConfig({});
    }
    throw err;
  }

  const parsed: unknown = parseYaml(raw);
  return parseAppConfig(parsed, `config file ${configPath}`);
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
