/**
 * Processor Module
 * Converts files one at a time and writes each result immediately
 */

import { readTextFile, writeTextFile } from "../utils";
import type { RecordStore } from "../codecs";
import type { ConversionContext, FileDescriptor } from "../types";

export async function process(ctx: ConversionContext): Promise<void> {
  if (!ctx.files) {
    throw new Error("Scanner must run before processor");
  }

  const { config, files, tracker, logger, dryRun } = ctx;

  // ============================================================================
  // Processing Functions
  // ============================================================================

  async function readRecords(file: FileDescriptor): Promise<RecordStore> {
    const text = await readTextFile(file.inputPath);
    return file.route.from.parse(text);
  }

  async function writeRecords(
    file: FileDescriptor,
    store: RecordStore,
  ): Promise<void> {
    const text = file.route.to.serialize(store, { indent: config.output.indent });
    if (dryRun) return;
    await writeTextFile(file.outputPath, text);
  }

  // ============================================================================
  // Main Orchestration
  // ============================================================================

  tracker.setTotalFiles(files.length);

  for (const file of files) {
    let store: RecordStore;
    try {
      store = await readRecords(file);
    } catch (error) {
      tracker.trackError(file, error, "read");
      continue;
    }

    try {
      await writeRecords(file, store);
    } catch (error) {
      tracker.trackError(file, error, "write");
      continue;
    }

    tracker.incrementConverted();
    logger.info(
      `${file.inputPath} => ${file.outputPath}${dryRun ? " (dry run)" : ""}`,
    );
  }
}
