import { runBatch, type PipelineOutcome } from "@notes-to-blog/content-pipeline";
import { errorMessage } from "@notes-to-blog/core";
import { archiveNote, loadNotes } from "@notes-to-blog/ingestion";
import { OutputExistsError, loadTemplate, writeBlogPost } from "@notes-to-blog/publishing";
import chalk from "chalk";
import Table from "cli-table3";
import ora from "ora";
import { loadRuntime, type Runtime } from "../runtime.js";
import { formatCost, formatDuration, outcomeLabel } from "../output.js";

interface BatchCommandOptions {
  concurrency?: number;
  dryRun: boolean;
  overwrite?: boolean;
  archive: boolean;
  config?: string;
}

export async function batchCommand(dir: string | undefined, options: BatchCommandOptions) {
  let runtime: Runtime;
  try {
    runtime = await loadRuntime(options.config, { dryRun: options.dryRun });
  } catch (err) {
    console.log(chalk.red(`Error: ${errorMessage(err)}`));
    process.exitCode = 1;
    return;
  }
  const { paths, output, batch } = runtime.config;
  const inboxDir = dir ?? paths.inboxDir;
  const concurrency = options.concurrency ?? batch.concurrency;

  console.log(
    chalk.blue(`\n${options.dryRun ? "[DRY RUN] " : ""}Batch processing ${inboxDir} (concurrency ${concurrency})\n`)
  );

  const spinner = ora();
  const controller = new AbortController();
  const onInterrupt = () => {
    console.log(chalk.yellow("\n  Interrupted, notes in progress stop after their current stage"));
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  try {
    const { notes, skipped } = await loadNotes(inboxDir);
    for (const skip of skipped) {
      console.log(chalk.yellow(`  skipped ${skip.path}: ${skip.reason}`));
    }
    if (notes.length === 0) {
      console.log(chalk.yellow(`  No notes found in ${inboxDir}\n`));
      return;
    }

    let done = 0;
    spinner.start(`0/${notes.length} notes processed`);
    const { outcomes, summary } = await runBatch(notes, runtime.orchestrator, {
      concurrency,
      signal: controller.signal,
      onNoteComplete: () => {
        done++;
        spinner.text = `${done}/${notes.length} notes processed`;
      },
    });
    spinner.stop();

    const template = options.dryRun ? undefined : await loadTemplate(paths.templatesDir);
    const results = new Map<string, string>();
    let writeFailures = 0;

    for (const outcome of outcomes) {
      if (outcome.status !== "completed" || !template) continue;
      try {
        const written = await writeBlogPost(outcome.artifact, paths.outputDir, {
          template,
          overwrite: options.overwrite ?? output.overwrite,
          draft: output.draft,
        });
        results.set(outcome.sourcePath, written.filePath);
        if (options.archive) await archiveNote(outcome.sourcePath, inboxDir);
      } catch (err) {
        writeFailures++;
        const reason = err instanceof OutputExistsError ? "output exists" : errorMessage(err);
        results.set(outcome.sourcePath, chalk.red(`not written: ${reason}`));
      }
    }

    console.log(resultsTable(outcomes, results));
    console.log();
    console.log(
      `  ${chalk.green(`${summary.succeeded} completed`)}, ${chalk.red(`${summary.failed} failed`)}, ` +
        `${chalk.yellow(`${summary.cancelled} cancelled`)} of ${summary.total} ` +
        `in ${formatDuration(summary.durationMs)} (${formatCost(summary.totalCost)})`
    );
    console.log();

    if (summary.failed > 0 || summary.cancelled > 0 || writeFailures > 0) {
      process.exitCode = 1;
    }
  } catch (err) {
    spinner.fail(`Batch failed: ${errorMessage(err)}`);
    process.exitCode = 1;
  } finally {
    process.off("SIGINT", onInterrupt);
    await runtime.close();
  }
}

function resultsTable(outcomes: readonly PipelineOutcome[], written: Map<string, string>): string {
  const table = new Table({
    head: [chalk.blue("Note"), chalk.blue("Result"), chalk.blue("Output / reason"), chalk.blue("Cost")],
  });
  for (const outcome of outcomes) {
    const detail =
      outcome.status === "completed"
        ? written.get(outcome.sourcePath) ?? outcome.artifact.filename
        : outcome.failure.message;
    table.push([outcome.sourcePath, outcomeLabel(outcome), detail, formatCost(outcome.totalCost)]);
  }
  return table.toString();
}
