import { config } from "dotenv";
import { resolve } from "node:path";

// Load .env from project root
config({ path: resolve(process.cwd(), ".env") });

export function requireEnv(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(`Required environment variable ${key} is not set`);
  }
  return value;
}

export function optionalEnv(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

export const env = {
  get anthropicApiKey() {
    return process.env.ANTHROPIC_API_KEY;
  },
  get anthropicBaseUrl() {
    return process.env.ANTHROPIC_BASE_URL;
  },
  get openRouterApiKey() {
    return process.env.OPENROUTER_API_KEY;
  },
  get openRouterBaseUrl() {
    return optionalEnv("OPENROUTER_BASE_URL", "https://openrouter.ai/api/v1");
  },
  get braveApiKey() {
    return process.env.BRAVE_API_KEY;
  },
  get replicateApiToken() {
    return process.env.REPLICATE_API_TOKEN;
  },
  get redisUrl() {
    return optionalEnv("REDIS_URL", "redis://localhost:6379");
  },
  get configPath() {
    return optionalEnv("NOTES_TO_BLOG_CONFIG", "notes-to-blog.yml");
  },
};
