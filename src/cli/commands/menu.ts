/**
 * Menu command - Interactive conversion loop (default action)
 */

import { createInterface } from "readline/promises";
import { z } from "zod";
import { Converter } from "../../converter";
import * as modules from "../../modules";
import { ensureDirectories, Logger } from "../../utils";
import { createAsk, runMenu } from "../menu";
import { SharedOptionsSchema, resolveConfig } from "../options";

type Options = z.input<typeof SharedOptionsSchema>;

export async function menuCommand(opts: Options): Promise<void> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  // Closing stdin (Ctrl+D) is treated like choosing "exit"
  const ask = createAsk(rl);

  try {
    const options = SharedOptionsSchema.parse(opts);
    const { config, logger } = await resolveConfig(options);

    await ensureDirectories(config, logger);

    const converter = new Converter(config, {
      logger,
      dryRun: options.dryRun,
    });

    await runMenu(ask, async (mode) => {
      modules.stats(await converter.run(mode));
    });
  } catch (error) {
    rl.close();
    new Logger().error("Conversion failed", error);
    process.exit(1);
  }

  rl.close();
  console.log("Exiting.");
  process.exit(0);
}
