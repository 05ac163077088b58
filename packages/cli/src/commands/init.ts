import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { getConfigPath, loadAppConfig } from "@notes-to-blog/core";
import { DEFAULT_TEMPLATE, TEMPLATE_FILE } from "@notes-to-blog/publishing";
import chalk from "chalk";

const TEMPLATE_CONFIG = `paths:
  inboxDir: ./inbox
  outputDir: ./output
  imagesDir: ./images
  templatesDir: ./templates

pipeline:
  maxRetriesPerStage: 2
  subheadingCountRange: [2, 5]
  tagCountRange: [2, 5]
  perStageTimeoutMs: 120000
  retryBackoffMs: 1000
  researchConcurrency: 3
  maxSearchResults: 5
  imageDimensions:
    width: 1024
    height: 1024

llm:
  provider: auto
  temperature: 0.7
  maxTokens: 4000

search:
  country: us
  safesearch: moderate

cache:
  backend: memory

batch:
  concurrency: 1

output:
  draft: true
  overwrite: false
`;

const SAMPLE_NOTE = `# Getting Started With Sourdough

- starter needs daily feeding, equal flour and water by weight
- autolyse for 30 min before adding salt
- stretch and folds every 30 min for the first 2 hours
- cold retard overnight improves flavour
- bake in a dutch oven, lid on for 20 min then off
`;

/** Write `content` unless the file exists. Returns whether it was written. */
async function writeIfAbsent(path: string, content: string): Promise<boolean> {
  try {
    await writeFile(path, content, { encoding: "utf-8", flag: "wx" });
    return true;
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "EEXIST") return false;
    throw err;
  }
}

export async function initCommand(options: { config?: string }) {
  const configPath = options.config ?? getConfigPath();

  console.log(chalk.blue("\nInitializing notes-to-blog workspace\n"));

  const wroteConfig = await writeIfAbsent(configPath, TEMPLATE_CONFIG);
  const config = await loadAppConfig(configPath);
  const { inboxDir, outputDir, imagesDir, templatesDir } = config.paths;

  for (const dir of [inboxDir, outputDir, imagesDir, templatesDir]) {
    await mkdir(dir, { recursive: true });
  }

  const templatePath = join(templatesDir, TEMPLATE_FILE);
  const samplePath = join(inboxDir, "sourdough.md");
  const files: Array<[string, boolean]> = [
    [configPath, wroteConfig],
    [templatePath, await writeIfAbsent(templatePath, DEFAULT_TEMPLATE)],
    [samplePath, await writeIfAbsent(samplePath, SAMPLE_NOTE)],
  ];

  for (const [path, written] of files) {
    console.log(written ? `  ${chalk.green("created")} ${path}` : `  ${chalk.gray("exists ")} ${path}`);
  }
  console.log();
  console.log(chalk.yellow("  Next steps:"));
  console.log("    1. Put ANTHROPIC_API_KEY (or OPENROUTER_API_KEY), BRAVE_API_KEY and REPLICATE_API_TOKEN in .env");
  console.log("    2. Run: notes-to-blog status");
  console.log(`    3. Run: notes-to-blog process ${samplePath} --dry-run`);
  console.log();
}
