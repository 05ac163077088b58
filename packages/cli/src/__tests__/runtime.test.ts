import { describe, it, expect, vi, afterEach } from "vitest";
import { join } from "node:path";
import { PipelineOrchestrator, runResearchStage } from "@notes-to-blog/content-pipeline";
import { parseAppConfig, type WorkflowArtifact } from "@notes-to-blog/core";
import { FileImageStore } from "@notes-to-blog/publishing";
import { MemoryResearchCache, RedisResearchCache } from "@notes-to-blog/services";
import { DryRunImageStore, createCache, createRegistry, createRuntime } from "../runtime.js";

describe("createRuntime", () => {
  it("wires a file image store and in-memory cache by default", () => {
    const runtime = createRuntime(parseAppConfig({}));

    expect(runtime.orchestrator).toBeInstanceOf(PipelineOrchestrator);
    expect(runtime.imageStore).toBeInstanceOf(FileImageStore);
    expect(runtime.cache).toBeInstanceOf(MemoryResearchCache);
    expect(runtime.orchestrator.config.maxRetriesPerStage).toBe(2);
  });

  it("keeps images in memory for dry runs", async () => {
    const runtime = createRuntime(parseAppConfig({ paths: { imagesDir: "/tmp/ntb-images" } }), { dryRun: true });
    const store = runtime.imageStore;
    expect(store).toBeInstanceOf(DryRunImageStore);

    const path = await store.save(
      { data: Uint8Array.from([1]), mimeType: "image/webp", extension: "webp", model: "test-model" },
      "post-header"
    );
    expect(path).toBe(join("/tmp/ntb-images", "post-header.webp"));
  });

  it("passes pipeline settings to the orchestrator", () => {
    const runtime = createRuntime(parseAppConfig({ pipeline: { maxRetriesPerStage: 0, tagCountRange: [1, 3] } }));
    expect(runtime.orchestrator.config.maxRetriesPerStage).toBe(0);
    expect(runtime.orchestrator.config.tagCountRange).toEqual([1, 3]);
  });
});

describe("createRegistry", () => {
  it("registers the search and image providers", () => {
    const registry = createRegistry(parseAppConfig({}));
    expect(registry.get("search").provider).toBe("brave");
    expect(registry.get("image").provider).toBe("replicate");
  });
});

describe("createCache", () => {
  it("selects the backend from config", () => {
    expect(createCache(parseAppConfig({ cache: { backend: "memory", ttlSeconds: 60 } }))).toBeInstanceOf(
      MemoryResearchCache
    );
    expect(createCache(parseAppConfig({ cache: { backend: "redis" } }))).toBeInstanceOf(RedisResearchCache);
  });
});

describe("client retries", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.unstubAllGlobals();
  });

  it("leaves retries to the stage so a timed-out search is attempted once", async () => {
    vi.stubEnv("BRAVE_API_KEY", "test-key");
    const fetchMock = vi.fn<typeof fetch>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          const signal = init?.signal;
          if (signal) signal.addEventListener("abort", () => reject(signal.reason));
        })
    );
    vi.stubGlobal("fetch", fetchMock);

    const runtime = createRuntime(
      parseAppConfig({ pipeline: { maxRetriesPerStage: 0, perStageTimeoutMs: 50 } }),
      { dryRun: true }
    );
    runtime.registry.markStatus("search", "available");

    const artifact: WorkflowArtifact = {
      title: "Tips for Home Composting",
      description: "Turn kitchen scraps into garden gold.",
      subheadings: [{ title: "Choosing a Bin", sources: [] }],
      tags: [],
      images: [],
    };

    const started = Date.now();
    const result = await runResearchStage(artifact, {
      note: { content: "compost notes for testing", sourcePath: "inbox/compost.md", format: "markdown" },
      registry: runtime.registry,
      cache: runtime.cache,
      config: runtime.config.pipeline,
      imageStore: runtime.imageStore,
      attempt: 1,
      now: () => new Date("2024-05-01T12:00:00Z"),
    });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(Date.now() - started).toBeLessThan(1000);
    expect(result.status).toBe("success");
    if (result.status !== "success") return;
    expect(result.artifact.subheadings[0].researchNotes).toBe("");
  });
});
