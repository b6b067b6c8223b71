#!/usr/bin/env tsx

/**
 * CLI entry point for the lang/JSON converter
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { convertCommand } from "./commands/convert";
import { configCommand } from "./commands/config";
import { menuCommand } from "./commands/menu";

const program = new Command();

program
  .name("langconv")
  .description("Convert .lang localization files to JSON and back")
  .version("0.1.0")
  // Program options only apply before a sub-command, so `convert` keeps its own
  .enablePositionalOptions();

// Interactive menu (default action)
program
  .option("-i, --input <path>", "Input directory containing .lang/.json files")
  .option("-o, --output <path>", "Output directory for converted files")
  .option("-c, --config <path>", "Path to custom config file")
  .option("--indent <spaces>", "Indentation of JSON output")
  .option("--dry-run", "Preview conversion without writing files")
  .option("-v, --verbose", "Verbose output")
  .action(menuCommand);

// Convert command - one batch run without the menu
program
  .command("convert <mode>")
  .description("Convert once: lang-to-json, json-to-lang or both")
  .option("-i, --input <path>", "Input directory containing .lang/.json files")
  .option("-o, --output <path>", "Output directory for converted files")
  .option("-c, --config <path>", "Path to custom config file")
  .option("--indent <spaces>", "Indentation of JSON output")
  .option("--dry-run", "Preview conversion without writing files")
  .option("-v, --verbose", "Verbose output")
  .action(convertCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

program.parse();
