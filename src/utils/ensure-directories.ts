import { mkdir } from "fs/promises";
import { resolve } from "node:path";
import { directoryExists } from "./directory-exists";
import type { ConversionConfig } from "../types";
import type { Logger } from "./logger";

/**
 * Create the input and output directories if they are missing
 *
 * @returns Directories that were created
 */
export async function ensureDirectories(
  config: ConversionConfig,
  logger: Logger,
): Promise<string[]> {
  const created: string[] = [];

  for (const [label, directory] of [
    ["input", config.input.directory],
    ["output", config.output.directory],
  ] as const) {
    if (await directoryExists(directory)) continue;

    await mkdir(directory, { recursive: true });
    created.push(directory);
    logger.info(`Created ${label} directory: ${resolve(directory)}`);
  }

  return created;
}
