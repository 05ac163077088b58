import { env, getConfigPath, loadAppConfig } from "@notes-to-blog/core";
import chalk from "chalk";
import { stringify } from "yaml";

const SECRETS = {
  ANTHROPIC_API_KEY: () => env.anthropicApiKey,
  OPENROUTER_API_KEY: () => env.openRouterApiKey,
  BRAVE_API_KEY: () => env.braveApiKey,
  REPLICATE_API_TOKEN: () => env.replicateApiToken,
};

export async function configCommand(options: { config?: string }) {
  try {
    const config = await loadAppConfig(options.config);

    console.log(chalk.blue(`\nResolved config (${options.config ?? getConfigPath()})\n`));
    console.log(stringify(config).trimEnd());

    console.log(chalk.blue("\nEnvironment\n"));
    for (const [name, read] of Object.entries(SECRETS)) {
      console.log(`  ${name.padEnd(20)} ${read() ? chalk.green("set") : chalk.gray("not set")}`);
    }
    console.log();
  } catch (err) {
    console.log(chalk.red(`Error: ${err instanceof Error ? err.message : err}`));
    process.exitCode = 1;
  }
}
