/**
 * Converter - Pipeline orchestrator
 * Runs one batch run: scan the input directory, then convert each file
 */

import { Tracker, Logger } from "./utils";
import * as modules from "./modules";
import type {
  ConversionConfig,
  ConversionContext,
  ConversionMode,
  ProcessingStats,
} from "./types";

export interface ConverterOptions {
  logger?: Logger;
  dryRun?: boolean;
}

export class Converter {
  private logger: Logger;

  constructor(
    private config: ConversionConfig,
    private options: ConverterOptions = {},
  ) {
    this.logger = options.logger ?? new Logger(config.logging.level);
  }

  /**
   * Run the conversion pipeline for one mode
   * A fresh tracker is used per run, so failure logs never carry over
   */
  async run(mode: ConversionMode): Promise<ProcessingStats> {
    const ctx: ConversionContext = {
      config: this.config,
      mode,
      logger: this.logger,
      dryRun: this.options.dryRun,
      tracker: new Tracker(mode),
    };

    await modules.scan(ctx);
    await modules.process(ctx);

    return ctx.tracker.getStats();
  }
}
