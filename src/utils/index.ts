/**
 * Utility exports
 */

// Filesystem utilities
export { directoryExists } from "./directory-exists";
export { readTextFile } from "./read-text-file";
export { writeTextFile } from "./write-text-file";
export { ensureDirectories } from "./ensure-directories";

// Config utilities
export {
  loadConfig,
  getUserConfigPath,
  loadDefaultConfig,
  mergeConfig,
} from "./load-config";

// Classes
export { Logger } from "./logger";
export { Tracker } from "./tracker";
