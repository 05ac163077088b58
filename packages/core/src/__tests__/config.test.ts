import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadAppConfig, parseAppConfig } from "../config.js";

describe("loadAppConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "ntb-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("returns defaults when the file is missing", async () => {
    const config = await loadAppConfig(join(dir, "missing.yml"));
    expect(config.paths.inboxDir).toBe("./inbox");
    expect(config.pipeline.maxRetriesPerStage).toBe(2);
    expect(config.cache.backend).toBe("memory");
    expect(config.batch.concurrency).toBe(1);
  });

  it("merges file values over defaults", async () => {
    const path = join(dir, "notes-to-blog.yml");
    await writeFile(
      path,
      [
        "paths:",
        "  outputDir: ./posts",
        "pipeline:",
        "  maxRetriesPerStage: 4",
        "  tagCountRange: [3, 4]",
        "batch:",
        "  concurrency: 2",
      ].join("\n"),
      "utf-8"
    );

    const config = await loadAppConfig(path);
    expect(config.paths.outputDir).toBe("./posts");
    expect(config.paths.imagesDir).toBe("./images");
    expect(config.pipeline.maxRetriesPerStage).toBe(4);
    expect(config.pipeline.tagCountRange).toEqual([3, 4]);
    expect(config.pipeline.subheadingCountRange).toEqual([2, 5]);
    expect(config.batch.concurrency).toBe(2);
  });

  it("treats an empty file as defaults", async () => {
    const path = join(dir, "empty.yml");
    await writeFile(path, "", "utf-8");
    const config = await loadAppConfig(path);
    expect(config.llm.provider).toBe("auto");
  });
});

describe("parseAppConfig", () => {
  it("lists every invalid path", () => {
    expect(() =>
      parseAppConfig({ pipeline: { maxRetriesPerStage: -1 }, cache: { backend: "disk" } })
    ).toThrow(/pipeline\.maxRetriesPerStage[\s\S]*cache\.backend/);
  });
});
