import type { z } from 'zod';
import {
  BUNDLE_OPTIONS_SCHEMA,
  CLI_SETTINGS_SCHEMA,
  PRESETS_OPTIONS_SCHEMA,
  VALIDATE_OPTIONS_SCHEMA,
  type BundleOptions,
  type PresetsOptions,
  type ValidateOptions,
} from '../schemas/cli-schemas';
import type { CliOverrides } from '../presets/types';
import { parseWithSchema } from './yaml-parser';

function parseOptions<T extends z.ZodTypeAny>(schema: T, raw: unknown, what: string): z.output<T> {
  return parseWithSchema(schema, raw, what, { source: 'command line' });
}

export function parseBundleOptions(raw: unknown): BundleOptions {
  return parseOptions(BUNDLE_OPTIONS_SCHEMA, raw, 'CLI options');
}

export function parseValidateOptions(raw: unknown): ValidateOptions {
  return parseOptions(VALIDATE_OPTIONS_SCHEMA, raw, 'validate options');
}

export function parsePresetsOptions(raw: unknown): PresetsOptions {
  return parseOptions(PRESETS_OPTIONS_SCHEMA, raw, 'presets options');
}

/*
 * Builds the CLI settings layer. `raw` holds only options given
 * explicitly; anything absent stays absent and takes no part in
 * resolution.
 */
export function buildCliOverrides(raw: unknown): CliOverrides {
  const input = parseOptions(CLI_SETTINGS_SCHEMA, raw, 'setting overrides');
  const overrides: CliOverrides = {};
  if (input.securityCheck !== undefined) overrides.securityCheck = input.securityCheck;
  if (input.maxFileSize !== undefined) overrides.maxFileSize = input.maxFileSize;
  if (input.includeDotPaths !== undefined) overrides.includeHidden = input.includeDotPaths;
  if (input.includeBinaryFiles !== undefined) overrides.includeBinary = input.includeBinaryFiles;
  if (input.removeScrapedMetadata !== undefined) overrides.removeScrapedMetadata = input.removeScrapedMetadata;
  if (input.lineEnding !== undefined) overrides.lineEnding = input.lineEnding;
  if (input.separatorStyle !== undefined) overrides.separatorStyle = input.separatorStyle;
  if (input.metadata !== undefined) overrides.includeMetadata = input.metadata;
  if (input.maxLines !== undefined) overrides.maxLines = input.maxLines;
  return overrides;
}
