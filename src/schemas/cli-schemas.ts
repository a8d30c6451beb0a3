import { z } from 'zod';
import { SeparatorStyle } from '../presets/types';
import { DEFAULT_CONCURRENCY } from '../config/constants';
import { FILE_SIZE_SCHEMA, LINE_ENDING_SCHEMA, SECURITY_CHECK_SCHEMA } from './preset-schemas';

// Main bundle command options
export const BUNDLE_OPTIONS_SCHEMA = z.object({
  source: z.string().default('.'),
  output: z.string().optional(),
  preset: z.array(z.string()).default([]),
  presetGroup: z.string().optional(),
  disablePresets: z.boolean().default(false),
  userPresets: z.boolean().default(true),
  verbose: z.boolean().default(false),
  quiet: z.boolean().default(false),
  strict: z.boolean().default(false),
  explain: z.boolean().default(false),
  concurrency: z.coerce.number().int().positive().default(DEFAULT_CONCURRENCY),
});

/*
 * Setting overrides given on the command line. Only options the user
 * actually typed reach this schema, so every key is optional.
 */
export const CLI_SETTINGS_SCHEMA = z.object({
  securityCheck: SECURITY_CHECK_SCHEMA.optional(),
  maxFileSize: FILE_SIZE_SCHEMA.optional(),
  includeDotPaths: z.boolean().optional(),
  includeBinaryFiles: z.boolean().optional(),
  removeScrapedMetadata: z.boolean().optional(),
  lineEnding: LINE_ENDING_SCHEMA.optional(),
  separatorStyle: z.nativeEnum(SeparatorStyle).optional(),
  metadata: z.boolean().optional(),
  // 0 lifts the limit
  maxLines: z.coerce
    .number()
    .int()
    .nonnegative()
    .transform((value) => (value === 0 ? null : value))
    .optional(),
});

// Validate command options
export const VALIDATE_OPTIONS_SCHEMA = z.object({
  preset: z.array(z.string()).default([]),
  presetGroup: z.string().optional(),
  userPresets: z.boolean().default(true),
  source: z.string().default('.'),
});

// Presets listing options
export const PRESETS_OPTIONS_SCHEMA = z.object({
  preset: z.array(z.string()).default([]),
  userPresets: z.boolean().default(true),
  source: z.string().default('.'),
  explain: z.string().optional(),
});

export type BundleOptions = z.infer<typeof BUNDLE_OPTIONS_SCHEMA>;
export type CliSettingsInput = z.infer<typeof CLI_SETTINGS_SCHEMA>;
export type ValidateOptions = z.infer<typeof VALIDATE_OPTIONS_SCHEMA>;
export type PresetsOptions = z.infer<typeof PRESETS_OPTIONS_SCHEMA>;
