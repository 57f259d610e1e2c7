import chalk from "chalk";
import ora, { type Ora } from "ora";

import { closeAppContext, createAppContext, type AppContext } from "../../app-context.js";
import { ConfigError } from "../../errors.js";
import { errorMessage } from "../../logger.js";

/**
 * Run a command body against a fresh application context, reporting failures
 * on the spinner and always closing the database.
 */
export async function withAppContext(
  spinnerText: string,
  task: (context: AppContext, spinner: Ora) => Promise<void>
): Promise<void> {
  const spinner = ora(spinnerText).start();
  let context: AppContext | null = null;

  try {
    context = createAppContext();
    await task(context, spinner);
  } catch (error) {
    spinner.fail(`Error: ${errorMessage(error)}`);
    if (error instanceof ConfigError) {
      for (const issue of error.issues) {
        console.error(chalk.yellow(`  ${issue}`));
      }
    }
    process.exitCode = 1;
  } finally {
    if (context !== null) {
      await closeAppContext(context);
    }
  }
}
