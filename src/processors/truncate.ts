import { z } from 'zod';
import { parseWithSchema } from '../boundaries/yaml-parser';
import type { Processor } from './types';

const DEFAULT_MAX_CHARS = 1000;

const TRUNCATE_ARGS_SCHEMA = z
  .object({
    max_chars: z.number().int().positive().optional(),
    max_lines: z.number().int().positive().optional(),
    add_marker: z.boolean().default(true),
  })
  .strict();

/*
 * Cuts content to a character or line budget. `max_lines` wins when both
 * are given; with neither the character budget defaults to 1000.
 */
export const truncate: Processor = (content, args, context) => {
  const options = parseWithSchema(TRUNCATE_ARGS_SCHEMA, args, 'truncate arguments', { file: context.path });

  if (options.max_lines !== undefined) {
    const lines = content.split('\n');
    // A trailing newline does not start another line
    if (lines[lines.length - 1] === '') lines.pop();
    if (lines.length <= options.max_lines) return content;
    const kept = lines.slice(0, options.max_lines).join('\n');
    return options.add_marker ? `${kept}\n... (truncated after ${options.max_lines} lines)` : kept;
  }

  const maxChars = options.max_chars ?? DEFAULT_MAX_CHARS;
  if (content.length <= maxChars) return content;
  const kept = content.slice(0, maxChars);
  return options.add_marker ? `${kept}\n... (truncated at ${maxChars} chars)` : kept;
};
