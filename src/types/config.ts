/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const InputConfigSchema = z.object({
  directory: z.string().min(1),
});

export const OutputConfigSchema = z.object({
  directory: z.string().min(1),
  indent: z.number().int().min(0).max(10), // Spaces per level in JSON output
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const ConversionConfigSchema = z.object({
  input: InputConfigSchema,
  output: OutputConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialConversionConfigSchema = z.object({
  input: InputConfigSchema.partial().optional(),
  output: OutputConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

export const ConversionModeSchema = z.enum([
  "lang-to-json",
  "json-to-lang",
  "both",
]);

// Infer TypeScript types from Zod schemas
export type InputConfig = z.infer<typeof InputConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type ConversionConfig = z.infer<typeof ConversionConfigSchema>;
export type PartialConversionConfig = z.infer<
  typeof PartialConversionConfigSchema
>;
export type ConversionMode = z.infer<typeof ConversionModeSchema>;

export interface ConfigError {
  path: string;
  error: unknown;
}
