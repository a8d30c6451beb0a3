import { z } from 'zod';
import { ActionName, LineEnding, SecurityCheckMode, SeparatorStyle } from '../presets/types';
import { parseFileSize } from '../utils/file-size';

export const FILE_SIZE_SCHEMA = z
  .union([z.number().int().nonnegative(), z.string(), z.null()])
  .transform((value, ctx) => {
    if (value === null || typeof value === 'number') return value;
    const bytes = parseFileSize(value);
    if (bytes === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid file size '${value}' (expected e.g. 500KB, 10MB)` });
      return z.NEVER;
    }
    return bytes;
  });

// "abort" is an alias of "error"; null disables the check
export const SECURITY_CHECK_SCHEMA = z
  .union([z.nativeEnum(SecurityCheckMode), z.literal('abort'), z.null()])
  .transform((value) => {
    if (value === null) return SecurityCheckMode.Skip;
    if (value === 'abort') return SecurityCheckMode.Error;
    return value;
  });

export const LINE_ENDING_SCHEMA = z.preprocess(
  (value) => (typeof value === 'string' ? value.toLowerCase() : value),
  z.nativeEnum(LineEnding)
);

// Fields any settings layer may carry, in their YAML spelling
const SETTINGS_FIELDS = {
  security_check: SECURITY_CHECK_SCHEMA.optional(),
  max_file_size: FILE_SIZE_SCHEMA.optional(),
  include_dot_paths: z.boolean().optional(),
  include_binary_files: z.boolean().optional(),
  remove_scraped_metadata: z.boolean().optional(),
  line_ending: LINE_ENDING_SCHEMA.optional(),
  separator_style: z.nativeEnum(SeparatorStyle).optional(),
  include_metadata: z.boolean().optional(),
  max_lines: z.number().int().positive().nullable().optional(),
  actions: z.array(z.nativeEnum(ActionName)).optional(),
  custom_processor: z.string().nullable().optional(),
  processor_args: z.record(z.string(), z.unknown()).optional(),
  strip_tags: z.array(z.string()).optional(),
  preserve_tags: z.array(z.string()).optional(),
};

export const SETTINGS_LAYER_SCHEMA = z.object(SETTINGS_FIELDS).strict();

export const RULE_SCHEMA = z
  .object({
    extensions: z.array(z.string()).default([]),
    patterns: z.array(z.string()).default([]),
    ...SETTINGS_FIELDS,
  })
  .strict();

const PATHS_FILE_SCHEMA = z
  .union([z.string(), z.array(z.string()), z.null()])
  .transform((value) => (value === null ? [] : Array.isArray(value) ? value : [value]));

/*
 * global_settings also carries options of the surrounding tool (encoding,
 * output paths, ...). Those are accepted and ignored here.
 */
export const GLOBAL_SETTINGS_SCHEMA = z.object({
  ...SETTINGS_FIELDS,
  include_patterns: z.array(z.string()).default([]),
  exclude_patterns: z.array(z.string()).default([]),
  include_extensions: z.array(z.string()).default([]),
  exclude_extensions: z.array(z.string()).default([]),
  include_paths_file: PATHS_FILE_SCHEMA.optional(),
  exclude_paths_file: PATHS_FILE_SCHEMA.optional(),
  extensions: z.record(z.string(), SETTINGS_LAYER_SCHEMA).default({}),
});

export const GROUP_SCHEMA = z
  .object({
    // Display name some documents carry; not used
    name: z.string().optional(),
    description: z
      .string()
      .nullable()
      .default('')
      .transform((value) => value ?? ''),
    enabled: z.boolean().default(true),
    priority: z.number().int().default(0),
    base_path: z.string().nullable().optional(),
    enabled_if_exists: z.string().nullable().optional(),
    global_settings: GLOBAL_SETTINGS_SCHEMA.nullable().optional(),
    presets: z.record(z.string(), RULE_SCHEMA.nullable()).optional(),
    rules: z.record(z.string(), RULE_SCHEMA.nullable()).optional(),
  })
  .strict()
  .refine((group) => !(group.presets && group.rules), {
    message: 'Use either "presets" or "rules" in a group, not both',
  });

export const PRESET_DOCUMENT_SCHEMA = z.record(z.string(), z.unknown());

export type SettingsLayerInput = z.infer<typeof SETTINGS_LAYER_SCHEMA>;
export type RuleInput = z.infer<typeof RULE_SCHEMA>;
export type GlobalSettingsInput = z.infer<typeof GLOBAL_SETTINGS_SCHEMA>;
export type GroupInput = z.infer<typeof GROUP_SCHEMA>;
