import { loadAppConfig } from "@notes-to-blog/core";
import { getInboxStatus } from "@notes-to-blog/ingestion";
import type { ServiceState } from "@notes-to-blog/services";
import chalk from "chalk";
import Table from "cli-table3";
import ora from "ora";
import { createRegistry } from "../runtime.js";

const STATE_COLORS: Record<ServiceState, (text: string) => string> = {
  available: chalk.green,
  degraded: chalk.yellow,
  unavailable: chalk.red,
};

export async function statusCommand(options: { config?: string }) {
  const spinner = ora();

  try {
    const config = await loadAppConfig(options.config);
    const registry = createRegistry(config);

    spinner.start("Checking capabilities...");
    const statuses = await registry.statusAll();
    spinner.stop();

    const table = new Table({
      head: [chalk.blue("Capability"), chalk.blue("Provider"), chalk.blue("State"), chalk.blue("Detail")],
    });
    for (const status of statuses) {
      table.push([
        status.name,
        registry.get(status.name).provider,
        STATE_COLORS[status.state](status.state),
        status.detail ?? "",
      ]);
    }
    console.log(`\n${table.toString()}\n`);

    const inbox = await getInboxStatus(config.paths.inboxDir);
    if (inbox.exists) {
      console.log(
        `  Inbox ${inbox.inboxDir}: ${inbox.supportedFiles} note(s)` +
          (inbox.unsupportedFiles > 0 ? chalk.gray(`, ${inbox.unsupportedFiles} unsupported file(s)`) : "")
      );
    } else {
      console.log(chalk.yellow(`  Inbox ${inbox.inboxDir} does not exist. Run: notes-to-blog init`));
    }
    console.log();

    if (statuses.some((s) => s.state === "unavailable")) process.exitCode = 1;
  } catch (err) {
    spinner.fail(`Status check failed: ${err instanceof Error ? err.message : err}`);
    process.exitCode = 1;
  }
}
