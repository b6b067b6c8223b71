/**
 * File-related type definitions
 */

import type { ConversionRoute } from "../codecs";

export interface FileDescriptor {
  inputPath: string; // Path of the source file inside the input directory
  outputPath: string; // <output>/<stem><target extension>
  stem: string; // Base filename without extension (e.g., "en_US")
  route: ConversionRoute;
}
