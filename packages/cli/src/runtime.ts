import { join } from "node:path";
import { PipelineOrchestrator, type ImageStore } from "@notes-to-blog/content-pipeline";
import { createChildLogger, env, loadAppConfig, type AppConfig } from "@notes-to-blog/core";
import { FileImageStore } from "@notes-to-blog/publishing";
import {
  BraveSearchClient,
  MemoryResearchCache,
  RedisResearchCache,
  ReplicateImageClient,
  ServiceRegistry,
  createLlmClient,
  type ImagePayload,
  type ResearchCache,
} from "@notes-to-blog/services";

const logger = createChildLogger({ module: "cli:runtime" });

/** Reports where an image would go without writing it. */
export class DryRunImageStore implements ImageStore {
  readonly saved: string[] = [];

  constructor(private readonly imagesDir: string) {}

  async save(payload: ImagePayload, baseName: string): Promise<string> {
    const filePath = join(this.imagesDir, `${baseName}.${payload.extension}`);
    this.saved.push(filePath);
    return filePath;
  }
}

export interface Runtime {
  config: AppConfig;
  registry: ServiceRegistry;
  cache: ResearchCache;
  imageStore: ImageStore;
  orchestrator: PipelineOrchestrator;
  close(): Promise<void>;
}

/**
 * Stages and the orchestrator own retries, bounded by `maxRetriesPerStage`
 * and `perStageTimeoutMs`, so each client call makes one attempt.
 */
export const SINGLE_ATTEMPT = { maxAttempts: 1 } as const;

export function createRegistry(config: AppConfig): ServiceRegistry {
  return new ServiceRegistry({
    llm: createLlmClient(config.llm.provider, {
      model: config.llm.model,
      temperature: config.llm.temperature,
      maxTokens: config.llm.maxTokens,
      requestsPerMinute: config.llm.requestsPerMinute,
      retry: SINGLE_ATTEMPT,
    }),
    search: new BraveSearchClient({
      apiKey: env.braveApiKey,
      endpoint: config.search.endpoint,
      country: config.search.country,
      safesearch: config.search.safesearch,
      retry: SINGLE_ATTEMPT,
    }),
    image: new ReplicateImageClient({
      apiToken: env.replicateApiToken,
      model: config.image.model,
      pollIntervalMs: config.image.pollIntervalMs,
      maxWaitMs: config.image.maxWaitMs,
      retry: SINGLE_ATTEMPT,
    }),
  });
}

export function createCache(config: AppConfig): ResearchCache {
  const { backend, ttlSeconds } = config.cache;
  if (backend === "redis") {
    logger.debug({ ttlSeconds }, "Using Redis research cache");
    return new RedisResearchCache({ url: env.redisUrl, ttlSeconds });
  }
  return new MemoryResearchCache(ttlSeconds === undefined ? {} : { ttlMs: ttlSeconds * 1000 });
}

/**
 * Wire clients, cache and image store into an orchestrator. Constructing
 * the runtime performs no network calls.
 */
export function createRuntime(config: AppConfig, options: { dryRun?: boolean } = {}): Runtime {
  const registry = createRegistry(config);
  const cache = createCache(config);
  const imageStore = options.dryRun
    ? new DryRunImageStore(config.paths.imagesDir)
    : new FileImageStore(config.paths.imagesDir);

  const orchestrator = new PipelineOrchestrator({
    registry,
    cache,
    config: config.pipeline,
    imageStore,
  });

  return {
    config,
    registry,
    cache,
    imageStore,
    orchestrator,
    async close() {
      if (cache instanceof RedisResearchCache) await cache.close();
    },
  };
}

export async function loadRuntime(configPath?: string, options: { dryRun?: boolean } = {}): Promise<Runtime> {
  return createRuntime(await loadAppConfig(configPath), options);
}
