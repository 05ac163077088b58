#!/usr/bin/env tsx

import { Command } from "commander";
import { initCommand } from "./commands/init.js";
import { processCommand } from "./commands/process.js";
import { batchCommand } from "./commands/batch.js";
import { statusCommand } from "./commands/status.js";
import { configCommand } from "./commands/config.js";
import { parsePositiveInt } from "./output.js";

const program = new Command();

program
  .name("notes-to-blog")
  .description("Turn raw note files into researched, illustrated blog posts")
  .version("0.1.0");

program
  .command("init")
  .description("Create the config file, working directories and default template")
  .option("-c, --config <path>", "Config file path")
  .action(initCommand);

program
  .command("process <file>")
  .description("Run one note through the pipeline")
  .option("--dry-run", "Run the pipeline without writing the post or images", false)
  .option("--overwrite", "Replace an existing post with the same filename")
  .option("-c, --config <path>", "Config file path")
  .action(processCommand);

program
  .command("batch [dir]")
  .description("Process every note in a directory (defaults to the inbox)")
  .option("-n, --concurrency <n>", "Notes processed at once", parsePositiveInt)
  .option("--dry-run", "Run the pipeline without writing posts or images", false)
  .option("--overwrite", "Replace existing posts with the same filename")
  .option("--archive", "Move processed notes into the inbox's processed/ directory", false)
  .option("-c, --config <path>", "Config file path")
  .action(batchCommand);

program
  .command("status")
  .description("Check the health of each capability")
  .option("-c, --config <path>", "Config file path")
  .action(statusCommand);

program
  .command("config")
  .description("Print the resolved configuration")
  .option("-c, --config <path>", "Config file path")
  .action(configCommand);

await program.parseAsync();
