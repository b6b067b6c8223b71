/**
 * Scanner Module
 * Lists the input directory and selects the files the current mode converts
 */

import glob from "fast-glob";
import path from "node:path";
import { getRoutes, findRoute } from "../codecs";
import { InputDirectoryError } from "../errors";
import { directoryExists } from "../utils";
import type { ConversionContext, FileDescriptor } from "../types";

/**
 * Scans the input directory (non-recursive) and populates context
 *
 * Directories and broken links are skipped, as is any file whose extension
 * has no route in the current mode. Order is the directory listing order.
 *
 * Writes to context:
 * - files: One descriptor per file to convert
 */
export async function scan(ctx: ConversionContext): Promise<void> {
  const { config, mode, logger } = ctx;
  const inputDir = config.input.directory;

  if (!(await directoryExists(inputDir))) {
    throw new InputDirectoryError(path.resolve(inputDir));
  }

  const entries = await glob("*", {
    cwd: inputDir,
    onlyFiles: true,
    dot: true,
    deep: 1,
    suppressErrors: true,
  });

  const routes = getRoutes(mode);
  const files: FileDescriptor[] = [];

  for (const name of entries) {
    const extension = path.extname(name);
    const route = findRoute(routes, extension);

    if (!route) {
      logger.debug(`Skipping ${name}`);
      continue;
    }

    const stem = path.basename(name, extension);

    files.push({
      inputPath: path.join(inputDir, name),
      outputPath: path.join(config.output.directory, `${stem}${route.to.extension}`),
      stem,
      route,
    });
  }

  ctx.files = files;
}
