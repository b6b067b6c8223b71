/**
 * Stats Module
 * Formats the end-of-run summary: counts, then each failure log
 */

import chalk from "chalk";
import type { FileFailure, ProcessingStats } from "../types";

const MODE_LABELS: Record<ProcessingStats["mode"], string> = {
  "lang-to-json": "lang => json",
  "json-to-lang": "json => lang",
  both: "lang <=> json",
};

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = (seconds % 60).toFixed(0);
  return `${minutes}m ${remainingSeconds}s`;
}

/**
 * Create a progress bar with percentage
 */
function progressBar(current: number, total: number, width = 24): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = current / total;
  const filled = Math.round(width * percentage);
  const empty = width - filled;
  const percentText = `${Math.round(percentage * 100)}%`;

  const filledBar = chalk.green("━".repeat(filled));
  const emptyBar = chalk.dim("━".repeat(empty));

  return `${filledBar}${emptyBar} ${chalk.dim(percentText)}`;
}

/**
 * Format a stat row with icon, label and value
 */
function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

function failureLines(title: string, failures: FileFailure[]): string[] {
  if (failures.length === 0) return [];

  return [
    sectionHeader(chalk.red(title)),
    ...failures.map(
      (failure) => `   - ${failure.stem}: ${chalk.dim(failure.message)}`,
    ),
  ];
}

// ============================================================================
// Summary
// ============================================================================

/**
 * Build the summary lines for a finished batch run
 */
export function formatStats(stats: ProcessingStats): string[] {
  const failed = stats.readFailures.length + stats.writeFailures.length;
  const statusIcon = failed > 0 ? chalk.red("✖") : chalk.green("✔");

  const lines = [
    "",
    `  ${statusIcon} ${chalk.bold("Conversion Complete")} ${chalk.dim("·")} ${chalk.dim(MODE_LABELS[stats.mode])} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
    sectionHeader("Files"),
    `   ${progressBar(stats.convertedFiles, stats.totalFiles)}`,
    statRow(chalk.green("◉"), "Converted", stats.convertedFiles, chalk.green),
  ];

  if (failed > 0) {
    lines.push(statRow(chalk.red("◉"), "Failed", failed, chalk.red));
  }

  if (failed === 0) {
    lines.push("", `  ${chalk.green("All files were converted successfully.")}`);
  } else {
    lines.push(
      ...failureLines("Read failures", stats.readFailures),
      ...failureLines("Write failures", stats.writeFailures),
    );
  }

  lines.push("");
  return lines;
}

/**
 * Display processing statistics to console
 */
export function stats(summary: ProcessingStats): void {
  for (const line of formatStats(summary)) {
    console.log(line);
  }
}
