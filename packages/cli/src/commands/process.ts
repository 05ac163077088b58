import { errorMessage, formatFailure } from "@notes-to-blog/core";
import { readNote } from "@notes-to-blog/ingestion";
import { loadTemplate, postStats, writeBlogPost } from "@notes-to-blog/publishing";
import chalk from "chalk";
import ora from "ora";
import { loadRuntime, type Runtime } from "../runtime.js";
import { describeFailure, formatCost, stageTable } from "../output.js";

interface ProcessOptions {
  dryRun: boolean;
  overwrite?: boolean;
  config?: string;
}

export async function processCommand(file: string, options: ProcessOptions) {
  console.log(chalk.blue(`\n${options.dryRun ? "[DRY RUN] " : ""}Processing: ${file}\n`));

  const spinner = ora();
  let runtime: Runtime;
  try {
    runtime = await loadRuntime(options.config, { dryRun: options.dryRun });
  } catch (err) {
    console.log(chalk.red(`Error: ${errorMessage(err)}`));
    process.exitCode = 1;
    return;
  }
  const controller = new AbortController();
  const onInterrupt = () => {
    spinner.warn("Interrupted, stopping after the current stage");
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  try {
    spinner.start("Reading note...");
    const note = await readNote(file);
    spinner.succeed(`Read ${note.title ? `"${note.title}"` : note.sourcePath} (${note.format})`);

    const outcome = await runtime.orchestrator.run(note, {
      signal: controller.signal,
      callbacks: {
        onStageStart: (stage, attempt) => {
          spinner.start(`Running ${stage}${attempt > 1 ? ` (attempt ${attempt})` : ""}...`);
        },
        onRetry: (stage, attempt, failure) => {
          spinner.warn(`${stage} attempt ${attempt} failed: ${formatFailure(failure)}`);
        },
        onStageComplete: (stage, record) => {
          if (record.status === "success") {
            spinner.succeed(`${stage} complete ${chalk.gray(`(${formatCost(record.cost)})`)}`);
          } else {
            spinner.fail(`${stage} failed`);
          }
        },
      },
    });

    console.log(`\n${stageTable(outcome.stages)}\n`);

    if (outcome.status === "failed") {
      console.log(chalk.red("  Pipeline failed"));
      for (const line of describeFailure(outcome.stage, outcome.failure)) console.log(chalk.red(`  ${line}`));
      console.log();
      process.exitCode = 1;
      return;
    }

    const stats = postStats(outcome.artifact);
    console.log(`  Title:    ${outcome.artifact.title}`);
    console.log(`  Category: ${outcome.artifact.category}`);
    console.log(`  Tags:     ${outcome.artifact.tags.join(", ")}`);
    console.log(`  Words:    ${stats.words} (${stats.readingMinutes} min read)`);
    console.log(`  Images:   ${stats.images}`);
    console.log(`  Cost:     ${formatCost(outcome.totalCost)}`);

    if (options.dryRun) {
      console.log(chalk.yellow(`\n  Dry run: ${outcome.artifact.filename} not written\n`));
      return;
    }

    const { paths, output } = runtime.config;
    const written = await writeBlogPost(outcome.artifact, paths.outputDir, {
      template: await loadTemplate(paths.templatesDir),
      overwrite: options.overwrite ?? output.overwrite,
      draft: output.draft,
    });
    console.log(chalk.green(`\n  Wrote ${written.filePath}\n`));
  } catch (err) {
    spinner.fail(`Processing failed: ${errorMessage(err)}`);
    process.exitCode = 1;
  } finally {
    process.off("SIGINT", onInterrupt);
    await runtime.close();
  }
}
