/**
 * Options shared by the menu and convert commands
 */

import { z } from "zod";
import { loadConfig, Logger } from "../utils";
import type { ConversionConfig } from "../types";

export const SharedOptionsSchema = z.object({
  input: z.string().optional(),
  output: z.string().optional(),
  config: z.string().optional(),
  indent: z.coerce.number().int().min(0).max(10).optional(),
  dryRun: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

export type SharedOptions = z.infer<typeof SharedOptionsSchema>;

interface ResolvedConfig {
  config: ConversionConfig;
  logger: Logger;
}

/**
 * Load configuration (default → user → custom) and apply CLI overrides
 * Config files that failed to load are reported as warnings
 */
export async function resolveConfig(
  options: SharedOptions,
): Promise<ResolvedConfig> {
  const { config, errors } = await loadConfig(options.config);

  if (options.input) {
    config.input.directory = options.input;
  }
  if (options.output) {
    config.output.directory = options.output;
  }
  if (options.indent !== undefined) {
    config.output.indent = options.indent;
  }
  if (options.verbose) {
    config.logging.level = "debug";
  }

  const logger = new Logger(config.logging.level);
  for (const { path, error } of errors) {
    const details = error instanceof Error ? error.message : String(error);
    logger.warn(`Ignoring config ${path}: ${details}`);
  }

  return { config, logger };
}
