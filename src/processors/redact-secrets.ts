import { z } from 'zod';
import { parseWithSchema } from '../boundaries/yaml-parser';
import type { Processor } from './types';

export const DEFAULT_SECRET_PATTERNS = [
  '(?i)(api[_-]?key|secret|password|token)\\s*[:=]\\s*["\']?[\\w-]+["\']?',
  '(?i)bearer\\s+[\\w-]+',
];

const REDACT_ARGS_SCHEMA = z
  .object({
    patterns: z.array(z.string().min(1)).default(DEFAULT_SECRET_PATTERNS),
    replacement: z.string().default('[REDACTED]'),
  })
  .strict();

/*
 * Compiles a user pattern. A leading `(?i)` inline flag is accepted and
 * turned into the `i` flag, since JavaScript has no inline modifiers.
 */
export function compilePattern(pattern: string): RegExp {
  const caseInsensitive = pattern.startsWith('(?i)');
  const body = caseInsensitive ? pattern.slice(4) : pattern;
  return new RegExp(body, caseInsensitive ? 'gi' : 'g');
}

export const redactSecrets: Processor = (content, args, context) => {
  const options = parseWithSchema(REDACT_ARGS_SCHEMA, args, 'redact_secrets arguments', { file: context.path });
  return options.patterns.reduce(
    (text, pattern) => text.replace(compilePattern(pattern), () => options.replacement),
    content
  );
};
