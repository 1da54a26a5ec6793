/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const InputConfigSchema = z.object({
  extensions: z.array(z.string()).min(1),
  copybookExtensions: z.array(z.string()),
  ignore: z.array(z.string()),
  // Optional allow-list, matched against relative path or file name (case-insensitive)
  selectedPrograms: z.array(z.string()).optional(),
});

export const OutputConfigSchema = z.object({
  directory: z.string(),
  sourceDirectory: z.string(),
  testDirectory: z.string(),
  extension: z.string(),
  testSuffix: z.string(),
});

export const TemplatesConfigSchema = z.object({
  class: z.string().nullable(),
  test: z.string().nullable(),
});

export const GeneratorConfigSchema = z.object({
  // Advisory only: a single template family is used for every stack
  targetStack: z.string(),
  packageName: z.string().regex(/^[A-Za-z_][\w]*(\.[A-Za-z_][\w]*)*$/, {
    message: "packageName must be a dotted identifier",
  }),
  reservedPrefixes: z.array(z.string()),
  templates: TemplatesConfigSchema,
});

export const ValidationConfigSchema = z.object({
  // Job-level validation passes once this many programs pass
  minPassed: z.number().int().nonnegative(),
});

export const IdConfigSchema = z.object({
  length: z.number().int().min(4).max(32),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error", "silent"]),
});

export const ConversionConfigSchema = z.object({
  input: InputConfigSchema,
  output: OutputConfigSchema,
  generator: GeneratorConfigSchema,
  validation: ValidationConfigSchema,
  ids: IdConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialConversionConfigSchema = ConversionConfigSchema.partial().extend({
  input: InputConfigSchema.partial().optional(),
  output: OutputConfigSchema.partial().optional(),
  generator: GeneratorConfigSchema.partial()
    .extend({
      templates: TemplatesConfigSchema.partial().optional(),
    })
    .optional(),
  validation: ValidationConfigSchema.partial().optional(),
  ids: IdConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type InputConfig = z.infer<typeof InputConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type TemplatesConfig = z.infer<typeof TemplatesConfigSchema>;
export type GeneratorConfig = z.infer<typeof GeneratorConfigSchema>;
export type ValidationConfig = z.infer<typeof ValidationConfigSchema>;
export type IdConfig = z.infer<typeof IdConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type ConversionConfig = z.infer<typeof ConversionConfigSchema>;
export type PartialConversionConfig = z.infer<typeof PartialConversionConfigSchema>;

export interface ConfigError {
  path: string;
  error: unknown;
}
