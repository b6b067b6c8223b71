/**
 * Conversion Tracker
 * Counters and the ordered read/write failure logs of one batch run
 */

import { JsonSyntaxError } from "../errors";
import type { ConversionMode } from "../types/config";
import type { FileDescriptor } from "../types/files";

// ============================================================================
// Types
// ============================================================================

export type FailureStage = "read" | "write";
export type FailureReason = "read-error" | "json-syntax-error" | "write-error";

export interface FileFailure {
  stem: string;
  path: string;
  reason: FailureReason;
  message: string;
}

export interface ProcessingStats {
  mode: ConversionMode;

  // File counts
  totalFiles: number;
  convertedFiles: number;

  // Failure logs, in the order files were visited
  readFailures: FileFailure[];
  writeFailures: FileFailure[];

  // Timing
  duration: number;
}

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface FailureInfo {
  reason: FailureReason;
  message: string;
}

function mapFileError(error: unknown, stage: FailureStage): FailureInfo {
  const message = error instanceof Error ? error.message : String(error);

  if (stage === "write") {
    return { reason: "write-error", message };
  }
  if (error instanceof JsonSyntaxError) {
    return { reason: "json-syntax-error", message };
  }
  return { reason: "read-error", message };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private totalFiles = 0;
  private convertedFiles = 0;
  private readFailures: FileFailure[] = [];
  private writeFailures: FileFailure[] = [];
  private startTime = new Date();

  constructor(private mode: ConversionMode) {}

  // ============================================================================
  // Stat counters
  // ============================================================================

  setTotalFiles(count: number): void {
    this.totalFiles = count;
  }

  incrementConverted(): void {
    this.convertedFiles++;
  }

  // ============================================================================
  // Failure tracking
  // ============================================================================

  /**
   * Record a failed file, deriving the reason from the error and stage
   */
  trackError(file: FileDescriptor, error: unknown, stage: FailureStage): void {
    const { reason, message } = mapFileError(error, stage);
    const failure: FileFailure = {
      stem: file.stem,
      path: file.inputPath,
      reason,
      message,
    };

    if (stage === "read") {
      this.readFailures.push(failure);
    } else {
      this.writeFailures.push(failure);
    }
  }

  getFailures(stage: FailureStage): FileFailure[] {
    return stage === "read" ? this.readFailures : this.writeFailures;
  }

  hasFailures(): boolean {
    return this.readFailures.length > 0 || this.writeFailures.length > 0;
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): ProcessingStats {
    const duration = new Date().getTime() - this.startTime.getTime();

    return {
      mode: this.mode,
      totalFiles: this.totalFiles,
      convertedFiles: this.convertedFiles,
      readFailures: [...this.readFailures],
      writeFailures: [...this.writeFailures],
      duration,
    };
  }
}
