/**
 * Convert command - Runs a single non-interactive batch run
 */

import ora from "ora";
import { z } from "zod";
import { Converter } from "../../converter";
import { Logger } from "../../utils";
import * as modules from "../../modules";
import { ConversionModeSchema } from "../../types";
import { SharedOptionsSchema, resolveConfig } from "../options";

type Options = z.input<typeof SharedOptionsSchema>;

export async function convertCommand(mode: string, opts: Options): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2 }).start();

  try {
    // Validate CLI arguments
    const conversionMode = ConversionModeSchema.parse(mode);
    const options = SharedOptionsSchema.parse(opts);

    spinner.text = "Loading configuration...";
    const { config, logger } = await resolveConfig(options);

    // Progress lines are printed per file, so the spinner stops here
    spinner.stop();

    const converter = new Converter(config, {
      logger,
      dryRun: options.dryRun,
    });
    const stats = await converter.run(conversionMode);

    modules.stats(stats);

    if (stats.readFailures.length > 0 || stats.writeFailures.length > 0) {
      process.exitCode = 1;
    }
  } catch (error) {
    spinner.stop();
    new Logger().error("Conversion failed", error);
    process.exit(1);
  }
}
