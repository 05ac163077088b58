export * from "./types.js";
export { CapabilityCallError, toCapabilityError, isPermanentError } from "./errors.js";
export { withRetry, withDeadline, RateLimiter, type RetryOptions } from "./retry.js";
export {
  AnthropicLlmClient,
  OpenRouterLlmClient,
  createLlmClient,
  type LlmClientOptions,
} from "./clients/llm.js";
export { BraveSearchClient, stripTags, type BraveSearchOptions } from "./clients/search.js";
export { ReplicateImageClient, type ReplicateImageOptions } from "./clients/image.js";
export {
  ServiceRegistry,
  CAPABILITY_NAMES,
  type CapabilityName,
  type CapabilityClients,
  type ServiceStatus,
  type ServiceRegistryOptions,
} from "./registry.js";
export {
  ResearchCache,
  MemoryResearchCache,
  RedisResearchCache,
  normalizeQueryKey,
  type CacheEntry,
  type CacheLookup,
  type ResearchPayload,
} from "./research-cache.js";
