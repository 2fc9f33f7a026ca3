/**
 * Configuration schema for `.docmeta/config.yaml`.
 */
import { z } from 'zod';

/**
 * Makes an object field optional and applies its inner defaults when missing.
 * Both undefined and null are treated as "missing".
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Files scanned for annotated classes. */
export const ScanSettingsSchema = z.object({
  include: z.array(z.string()).default(['src/**/*.ts']),
  exclude: z.array(z.string()).default([
    '**/node_modules/**',
    '**/dist/**',
    '**/*.d.ts',
    '**/*.test.ts',
    '**/*.spec.ts',
  ]),
});

/** Expansion behaviour. */
export const ExpansionSettingsSchema = z.object({
  /** Stop at the first failing directive instead of reporting all of them */
  fail_fast: z.boolean().default(false),
});

/** Framework base classes checked by the built-in annotations. */
export const BaseClassesSchema = z.object({
  model: z.string().min(1).default('Model'),
  controller: z.string().min(1).default('Controller'),
});

export const OutputFormatSchema = z.enum(['json', 'yaml']);

export const OutputSettingsSchema = z.object({
  format: OutputFormatSchema.default('json'),
});

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const ConfigSchema = z.object({
  scan: withDefaults(ScanSettingsSchema),
  expansion: withDefaults(ExpansionSettingsSchema),
  base_classes: withDefaults(BaseClassesSchema),
  /** Child → parent entries for classes defined outside the scanned files */
  hierarchy: z.record(z.string(), z.string()).default({}),
  output: withDefaults(OutputSettingsSchema),
  log_level: LogLevelSchema.default('info'),
});

export type Config = z.infer<typeof ConfigSchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
