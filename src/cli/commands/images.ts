import chalk from "chalk";

import { requireSection } from "../../config.js";
import { purgePrefix } from "../../storage/object-storage.js";
import { withAppContext } from "../utils/context.js";

import type { Command } from "commander";

export function registerImagesCommand(program: Command): void {
  const images = program
    .command("images")
    .description("Manage re-hosted images in object storage");

  // images purge
  images
    .command("purge [prefix]")
    .description("Delete every object under a prefix (defaults to S3_BASE_FOLDER)")
    .option("--yes", "Actually delete; without it only the objects are counted")
    .action(async (prefix: string | undefined, options: { yes?: boolean }) => {
      await withAppContext("Listing objects...", async ({ config, storage }, spinner) => {
        const store = requireSection(storage, "Object storage");
        const target = prefix ?? `${requireSection(config.storage, "Object storage").baseFolder}/`;

        if (options.yes !== true) {
          const paths = await store.list(target);
          spinner.info(
            `${String(paths.length)} object(s) under ${target} in ${store.bucket}`
          );
          console.log(chalk.yellow("Re-run with --yes to delete them."));
          return;
        }

        spinner.text = `Deleting objects under ${target}...`;
        const deleted = await purgePrefix(store, target);
        spinner.succeed(`Deleted ${String(deleted)} object(s) under ${target}`);
      });
    });
}
