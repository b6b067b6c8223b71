/**
 * Central type exports
 */

// Configuration
export type {
  ConversionConfig,
  PartialConversionConfig,
  InputConfig,
  OutputConfig,
  LoggingConfig,
  LogLevel,
  ConversionMode,
  ConfigError,
} from "./config";
export {
  ConversionConfigSchema,
  PartialConversionConfigSchema,
  ConversionModeSchema,
} from "./config";

// Files
export type { FileDescriptor } from "./files";

// Context
export type { ConversionContext } from "./context";

// Tracker
export type {
  FileFailure,
  FailureReason,
  FailureStage,
  ProcessingStats,
} from "../utils/tracker";
