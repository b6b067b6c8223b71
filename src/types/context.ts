/**
 * Conversion context - flows through the pipeline
 * Each module reads what it needs and writes its results back
 */

import type { ConversionConfig, ConversionMode } from "./config";
import type { FileDescriptor } from "./files";
import type { Tracker } from "../utils/tracker";
import type { Logger } from "../utils/logger";

export interface ConversionContext {
  // Input - provided at initialization
  config: ConversionConfig;
  mode: ConversionMode;
  logger: Logger;
  dryRun?: boolean;

  // Failure logs and counters for this batch run
  tracker: Tracker;

  files?: FileDescriptor[]; // Scanner output, in directory enumeration order
}
